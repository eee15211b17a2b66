/**
 * 필드 값 타입 변환
 *
 * - decimal: 로케일 유연 파싱, 범위를 벗어나면 경고 (값은 그대로 유지)
 * - integer: 구분자 제거 후 숫자 그룹
 * - string: trim, 빈 값/"null"/"N/A" → null
 */

import type { FieldSpec, FieldValue } from "@/core/domain/FieldSpec";
import { formatWarning } from "@/core/errors/warnings";
import { NumberParser } from "@/extractors/common/NumberParser";

export interface CoercionResult {
  value: FieldValue;
  warning: string | null;
}

const NULL_LIKE = new Set(["", "null", "none", "n/a", "na", "nil", "undefined", "-"]);

function coerceDecimal(raw: unknown): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw === "string") {
    return NumberParser.parseDecimal(raw);
  }
  return null;
}

function coerceInteger(raw: unknown): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? Math.trunc(raw) : null;
  }
  if (typeof raw === "string") {
    return NumberParser.parseInteger(raw);
  }
  return null;
}

function coerceString(raw: unknown): string | null {
  let text: string;
  if (typeof raw === "string") {
    text = raw;
  } else if (typeof raw === "number" || typeof raw === "boolean") {
    text = String(raw);
  } else if (Array.isArray(raw)) {
    text = raw
      .map((item) => coerceString(item))
      .filter((item): item is string => item !== null)
      .join(", ");
  } else {
    return null;
  }

  const trimmed = text.trim();
  return NULL_LIKE.has(trimmed.toLowerCase()) ? null : trimmed;
}

/**
 * 디코드된 값 → 필드 타입 값
 */
export function coerceValue(raw: unknown, field: FieldSpec): CoercionResult {
  if (raw === null || raw === undefined) {
    return { value: null, warning: null };
  }

  switch (field.valueType) {
    case "string":
      return { value: coerceString(raw), warning: null };
    case "integer":
      return withRangeCheck(coerceInteger(raw), field);
    case "decimal":
      return withRangeCheck(coerceDecimal(raw), field);
  }
}

/**
 * 문서화된 범위 검사 (clamp하지 않음)
 */
export function withRangeCheck(
  value: number | null,
  field: FieldSpec,
): CoercionResult {
  if (value === null || field.kind !== "predefined" || field.range === null) {
    return { value, warning: null };
  }

  const { min, max } = field.range;
  if (value < min || value > max) {
    return {
      value,
      warning: formatWarning(
        "ValidationWarning",
        `"${field.name}" value ${value} is outside the documented range [${min}, ${max}]`,
      ),
    };
  }
  return { value, warning: null };
}
