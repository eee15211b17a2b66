/**
 * 추출 파이프라인 에러 분류
 *
 * - AcquisitionError: 사용할 텍스트 없음 (요청 단위 치명적)
 * - InferenceUnavailableError: 모든 추론 티어 소진/미설정 (패턴 전용 모드로 진행)
 * - CancelledError: 호출자 취소
 * - InferenceBackendError: 개별 백엔드 호출 실패 (재시도 판단용)
 */

export class AcquisitionError extends Error {
  constructor(
    message: string,
    public readonly reasons: readonly string[] = [],
  ) {
    super(message);
    this.name = "AcquisitionError";
  }
}

export class InferenceUnavailableError extends Error {
  constructor(
    message: string,
    public readonly attemptCount: number,
  ) {
    super(message);
    this.name = "InferenceUnavailableError";
  }
}

export class CancelledError extends Error {
  constructor(message = "Request cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export type InferenceFailureKind =
  | "timeout"
  | "rate_limited"
  | "server_error"
  | "network"
  | "auth"
  | "bad_request"
  | "invalid_response";

const RETRYABLE_KINDS: ReadonlySet<InferenceFailureKind> = new Set([
  "timeout",
  "rate_limited",
  "server_error",
  "network",
]);

export class InferenceBackendError extends Error {
  constructor(
    message: string,
    public readonly kind: InferenceFailureKind,
    public readonly statusCode?: number,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = "InferenceBackendError";
  }

  /** 일시적 장애 여부 (timeout, rate limit, 5xx, 네트워크) */
  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}
