/**
 * 추론 시도 도메인 모델
 */

export type BackendTier = "local" | "hostedPrimary" | "hostedSecondary";

/**
 * 티어 고정 우선순위
 * 로컬(무료/비공개) → 호스팅 1순위(품질) → 호스팅 2순위(예산/레이트리밋)
 */
export const BACKEND_TIER_ORDER: readonly BackendTier[] = [
  "local",
  "hostedPrimary",
  "hostedSecondary",
];

export interface InferenceAttempt {
  readonly backendTier: BackendTier;
  readonly prompt: string;
  readonly rawResponse: string | null;
  readonly succeeded: boolean;
  /** 티어 내 시도 인덱스 (0부터) */
  readonly retryCount: number;
  /** 티어 시작 시점부터의 경과 시간 (백오프 포함) */
  readonly elapsedMs: number;
  /** 실패 사유 (정제된 메시지) */
  readonly error: string | null;
}
