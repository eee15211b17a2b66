/**
 * Result Parser & Validator
 *
 * 추론 시도 목록 + 필드 스펙 + 획득 텍스트 → ExtractionResult
 *
 * 처리 순서:
 * 1. 마지막 성공 시도의 응답에서 JSON 객체 디코드 (실패해도 계속)
 * 2. 필드별 타입 변환 (범위 밖 값은 경고)
 * 3. 값이 없는 필드는 획득 텍스트에 패턴 추출 (주 텍스트 → 보조 텍스트)
 * 4. 가격 쌍 교차 검증 (경고만)
 * 5. 요청 필드명으로만 values 구성 (누락은 null)
 * 6. 값 출처로 source 결정 (dom / ocr / mixed)
 */

import type { AcquisitionOutcome, TextOrigin } from "@/core/domain/AcquiredText";
import type {
  ExtractionResult,
  ResultSource,
  ValueProvenance,
} from "@/core/domain/Extraction";
import type { FieldSpec, FieldValue } from "@/core/domain/FieldSpec";
import type { InferenceAttempt } from "@/core/domain/InferenceAttempt";
import { formatWarning } from "@/core/errors/warnings";
import { validatePricePair } from "@/parsing/CrossFieldValidator";
import { extractJsonObject } from "@/parsing/JsonResponseExtractor";
import { extractByPattern } from "@/parsing/PatternFallbackExtractor";
import { coerceValue, withRangeCheck } from "@/parsing/ValueCoercer";

export interface ParsedExtraction {
  result: ExtractionResult;
  decoded: Record<string, unknown> | null;
  provenance: Record<string, ValueProvenance | null>;
}

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * 디코드된 객체에서 필드 값 조회
 * 정확히 일치 → 대소문자 무시 → 영숫자 정규화 순
 */
export function lookupDecoded(
  decoded: Record<string, unknown>,
  name: string,
): unknown {
  if (Object.prototype.hasOwnProperty.call(decoded, name)) {
    return decoded[name];
  }
  const keys = Object.keys(decoded);
  const lower = name.toLowerCase();
  const caseInsensitive = keys.find((k) => k.toLowerCase() === lower);
  if (caseInsensitive !== undefined) {
    return decoded[caseInsensitive];
  }
  const normalized = normalizeKey(name);
  const loose =
    normalized.length > 0
      ? keys.find((k) => normalizeKey(k) === normalized)
      : undefined;
  return loose === undefined ? undefined : decoded[loose];
}

/**
 * 마지막 성공 시도의 응답
 */
export function lastSuccessfulResponse(
  attempts: readonly InferenceAttempt[],
): string | null {
  for (let i = attempts.length - 1; i >= 0; i--) {
    const attempt = attempts[i];
    if (attempt.succeeded && attempt.rawResponse !== null) {
      return attempt.rawResponse;
    }
  }
  return null;
}

function resolveSource(
  primary: TextOrigin,
  provenance: Record<string, ValueProvenance | null>,
): ResultSource {
  const origins = new Set<TextOrigin>();
  for (const entry of Object.values(provenance)) {
    if (entry) origins.add(entry.origin);
  }
  if (origins.size > 1) return "mixed";
  const [only] = origins;
  return only ?? primary;
}

export class ResultParser {
  parse(
    attempts: readonly InferenceAttempt[],
    fields: readonly FieldSpec[],
    acquisition: AcquisitionOutcome,
  ): ParsedExtraction {
    const warnings: string[] = [];
    const values = new Map<string, FieldValue>();
    const provenance = new Map<string, ValueProvenance | null>();
    const primaryOrigin = acquisition.primary.origin;

    // 1. JSON 디코드
    const response = lastSuccessfulResponse(attempts);
    const decoded =
      response === null ? null : this.decode(response, fields, warnings);

    // 2. 타입 변환
    for (const field of fields) {
      values.set(field.name, null);
      provenance.set(field.name, null);
      if (decoded === null) continue;

      const coerced = coerceValue(lookupDecoded(decoded, field.name), field);
      if (coerced.warning) warnings.push(coerced.warning);
      if (coerced.value !== null) {
        values.set(field.name, coerced.value);
        provenance.set(field.name, { stage: "inference", origin: primaryOrigin });
      }
    }

    // 3. 패턴 폴백
    const texts = [acquisition.primary, ...acquisition.supplementary];
    for (const field of fields) {
      if (values.get(field.name) !== null) continue;

      for (const text of texts) {
        const value = extractByPattern(field, text.content);
        if (value === null) continue;

        const checked =
          typeof value === "number" ? withRangeCheck(value, field) : null;
        if (checked?.warning) warnings.push(checked.warning);
        values.set(field.name, value);
        provenance.set(field.name, { stage: "pattern", origin: text.origin });
        break;
      }
    }

    // 4. 교차 검증
    const finalValues = Object.fromEntries(values);
    warnings.push(
      ...validatePricePair(
        fields,
        finalValues,
        texts.map((t) => t.content),
      ),
    );

    // 5, 6. 요청 필드만, 출처 결정
    const provenanceByField = Object.fromEntries(provenance);
    const result: ExtractionResult = {
      values: Object.freeze(finalValues),
      source: resolveSource(primaryOrigin, provenanceByField),
      warnings: Object.freeze([...warnings]),
      error: null,
    };

    return { result, decoded, provenance: provenanceByField };
  }

  private decode(
    response: string,
    fields: readonly FieldSpec[],
    warnings: string[],
  ): Record<string, unknown> | null {
    const { object, strategy } = extractJsonObject(response);
    if (object === null) {
      warnings.push(
        formatWarning(
          "ParsingAmbiguityWarning",
          "Inference response contained no decodable JSON object; falling back to pattern extraction",
        ),
      );
      return null;
    }

    if (strategy === "repaired") {
      warnings.push(
        formatWarning(
          "ParsingAmbiguityWarning",
          "Inference JSON was truncated or malformed and had to be repaired",
        ),
      );
    }
    if (
      fields.length > 0 &&
      fields.every((f) => lookupDecoded(object, f.name) === undefined)
    ) {
      warnings.push(
        formatWarning(
          "ParsingAmbiguityWarning",
          "Decoded inference JSON contains none of the requested fields",
        ),
      );
    }
    return object;
  }
}
