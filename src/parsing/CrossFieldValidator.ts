/**
 * 교차 필드 검증 (현재가 ↔ 정가)
 *
 * 의심스러운 쌍은 경고만 남기고 두 값 모두 유지 (판단은 호출자 몫)
 * - 현재가 > 정가
 * - 정가가 평점/리뷰 개수와 같거나, 텍스트에서 평점/리뷰 줄에만 나타남
 */

import type { FieldSpec, FieldValue, PredefinedFieldSpec } from "@/core/domain/FieldSpec";
import { formatWarning } from "@/core/errors/warnings";
import { NumberParser } from "@/extractors/common/NumberParser";

const COUNT_KEYS = new Set(["ratings_count", "reviews_count"]);
const RATING_SECTION = /\brat(?:ing|ings)\b|\breviews?\b|★|⭐/i;

function findByRole(
  fields: readonly FieldSpec[],
  role: PredefinedFieldSpec["role"],
): PredefinedFieldSpec | undefined {
  return fields.find(
    (f): f is PredefinedFieldSpec => f.kind === "predefined" && f.role === role,
  );
}

/**
 * 텍스트에서 값이 등장하는 줄 목록
 */
function linesContaining(text: string, value: number): string[] {
  return text.split("\n").filter((line) => {
    for (const match of line.matchAll(/\d[\d,.]*/g)) {
      const token = match[0].replace(/[.,]+$/, "");
      if (
        NumberParser.parseDecimal(token) === value ||
        NumberParser.parseInteger(token) === value
      ) {
        return true;
      }
    }
    return false;
  });
}

function isCurrencyAmount(line: string, value: number): boolean {
  return NumberParser.extractCurrencyAmounts(line).some(
    (amount) => NumberParser.parseDecimal(amount) === value,
  );
}

/**
 * 값이 평점/리뷰 줄에만 나타나는지 (통화 기호가 붙은 금액이면 가격 블록으로 간주)
 */
function fromRatingSectionOnly(text: string, value: number): boolean {
  const lines = linesContaining(text, value);
  return (
    lines.length > 0 &&
    lines.every(
      (line) => RATING_SECTION.test(line) && !isCurrencyAmount(line, value),
    )
  );
}

/**
 * 가격 쌍 검증
 * @param values - 요청 필드명 → 값
 * @param texts - 값을 찾을 수 있는 획득 텍스트 (주 텍스트 우선)
 * @returns 경고 목록 (없으면 빈 배열)
 */
export function validatePricePair(
  fields: readonly FieldSpec[],
  values: Readonly<Record<string, FieldValue>>,
  texts: readonly string[],
): string[] {
  const current = findByRole(fields, "currentPrice");
  const reference = findByRole(fields, "referencePrice");
  if (!current || !reference) {
    return [];
  }

  const currentValue = values[current.name];
  const referenceValue = values[reference.name];
  if (typeof currentValue !== "number" || typeof referenceValue !== "number") {
    return [];
  }

  const warnings: string[] = [];
  if (currentValue > referenceValue) {
    warnings.push(
      formatWarning(
        "ValidationWarning",
        `"${current.name}" (${currentValue}) exceeds "${reference.name}" (${referenceValue})`,
      ),
    );
  }

  const matchesCount = fields.some(
    (f) =>
      f.kind === "predefined" &&
      COUNT_KEYS.has(f.key) &&
      values[f.name] === referenceValue,
  );
  const text = texts.join("\n");
  if (matchesCount || fromRatingSectionOnly(text, referenceValue)) {
    warnings.push(
      formatWarning(
        "ValidationWarning",
        `"${reference.name}" (${referenceValue}) appears to come from the ratings/reviews section, not the price block`,
      ),
    );
  }
  if (fromRatingSectionOnly(text, currentValue)) {
    warnings.push(
      formatWarning(
        "ValidationWarning",
        `"${current.name}" (${currentValue}) appears to come from the ratings/reviews section, not the price block`,
      ),
    );
  }

  return warnings;
}
