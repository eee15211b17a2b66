/**
 * 필드 스펙 도메인 모델
 *
 * 추출 대상 필드 하나를 표현하는 닫힌 태그드 유니온
 * - predefined: 레지스트리가 소유하는 불변 정의 (config/fields.yaml)
 * - custom: 임의의 필드명으로부터 요청 시점에 합성
 */

export type FieldValueType = "decimal" | "integer" | "string";

/**
 * 교차 검증용 가격 역할
 * - currentPrice: 현재 판매가
 * - referencePrice: 취소선 가격 (MRP / 정가)
 */
export type FieldRole = "currentPrice" | "referencePrice";

export interface FieldRange {
  min: number;
  max: number;
}

interface FieldSpecBase {
  /** 요청된 그대로의 필드명 (결과 키) */
  readonly name: string;
  readonly valueType: FieldValueType;
  /** 추론 단계에 전달할 자연어 규칙 (순서 유지) */
  readonly extractionRules: readonly string[];
  readonly example: string | null;
  readonly description: string;
}

export interface PredefinedFieldSpec extends FieldSpecBase {
  readonly kind: "predefined";
  /** 정규화된 사전 정의 키 (rating, mrp, ...) */
  readonly key: string;
  readonly range: FieldRange | null;
  readonly role: FieldRole | null;
}

export interface CustomFieldSpec extends FieldSpecBase {
  readonly kind: "custom";
  readonly valueType: "string";
  /** 텍스트에서 찾을 라벨 (밑줄/점을 공백으로 치환한 표시명) */
  readonly label: string;
}

export type FieldSpec = PredefinedFieldSpec | CustomFieldSpec;

/**
 * 필드 값 (coercion 이후)
 */
export type FieldValue = number | string | null;
