/**
 * 추출 요청/결과 도메인 모델
 */

import type { TextOrigin } from "@/core/domain/AcquiredText";
import type { FieldSpec, FieldValue } from "@/core/domain/FieldSpec";
import type { BackendTier } from "@/core/domain/InferenceAttempt";

/**
 * 상위 호출자가 보내는 요청 형태
 */
export interface ExtractionInput {
  url: string;
  fields?: string[];
  preferDomText?: boolean;
  allowOcrFallback?: boolean;
  debug?: boolean;
}

/**
 * 오케스트레이터 1회 실행이 소유하는 불변 요청
 */
export interface ExtractionRequest {
  readonly url: string;
  readonly fields: readonly FieldSpec[];
  readonly preferDomText: boolean;
  readonly allowOcrFallback: boolean;
  readonly debug: boolean;
}

export type ResultSource = TextOrigin | "mixed";

/**
 * 값 출처
 * - inference: 추론 응답에서 얻은 값 (주 텍스트 origin 기준)
 * - pattern: 패턴 추출로 얻은 값 (해당 텍스트 origin 기준)
 */
export interface ValueProvenance {
  stage: "inference" | "pattern";
  origin: TextOrigin;
}

/**
 * debug 요청 시에만 포함되는 진단 정보 (프롬프트 본문 제외)
 */
export interface ExtractionDiagnostics {
  text: { origin: TextOrigin; length: number; qualitySignal: number } | null;
  attempts: Array<{
    backendTier: BackendTier;
    succeeded: boolean;
    retryCount: number;
    elapsedMs: number;
    error: string | null;
  }>;
  decoded: Record<string, unknown> | null;
  provenance: Record<string, ValueProvenance | null>;
}

export interface ExtractionResult {
  readonly values: Readonly<Record<string, FieldValue>>;
  readonly source: ResultSource;
  readonly warnings: readonly string[];
  readonly error: string | null;
  readonly diagnostics?: ExtractionDiagnostics;
}

/**
 * 배치 결과 (URL별 독립 envelope)
 */
export interface UrlExtractionResult extends ExtractionResult {
  readonly url: string;
}
