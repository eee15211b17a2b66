/**
 * 획득 텍스트 도메인 모델
 */

export type TextOrigin = "dom" | "ocr";

export interface AcquiredText {
  /** 원문 전체 (절대 자르지 않음) */
  readonly content: string;
  readonly origin: TextOrigin;
  /** 공백 제외 문자 수 */
  readonly qualitySignal: number;
}

/**
 * 텍스트 획득 결과
 * - primary: 선택된 주 텍스트
 * - supplementary: 임계값 미달이지만 비어 있지 않은 보조 텍스트 (패턴 추출용)
 */
export interface AcquisitionOutcome {
  readonly primary: AcquiredText;
  readonly supplementary: readonly AcquiredText[];
}
