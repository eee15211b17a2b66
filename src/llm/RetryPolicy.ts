/**
 * 추론 재시도 정책
 *
 * 추론 체인에 주입되는 명시적 정책 객체
 * delay(n) = min(maxDelayMs, max(retryAfterMs, baseDelayMs * multiplier^n))
 */

import { parseInferenceError } from "@/llm/InferenceErrorParser";

export interface RetryPolicy {
  /** 티어당 최대 시도 횟수 (첫 시도 포함) */
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  isRetryable(error: unknown): boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 60000,
  isRetryable: (error) => parseInferenceError(error).retryable,
};

export function createRetryPolicy(
  overrides: Partial<RetryPolicy> = {},
): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error(`maxAttempts must be a positive integer: ${policy.maxAttempts}`);
  }
  if (policy.baseDelayMs < 0 || policy.maxDelayMs < 0 || policy.multiplier < 1) {
    throw new Error("Retry delays must be non-negative and multiplier >= 1");
  }
  return policy;
}

/**
 * n번째 실패(0부터) 후 대기 시간
 */
export function computeBackoffDelay(
  policy: RetryPolicy,
  failureIndex: number,
  error: unknown,
): number {
  const exponential = policy.baseDelayMs * policy.multiplier ** failureIndex;
  const retryAfter = parseInferenceError(error).retryAfterMs ?? 0;
  return Math.min(policy.maxDelayMs, Math.max(retryAfter, exponential));
}
