/**
 * 추론 백엔드 에러 파싱 유틸리티
 *
 * 백엔드별 실패를 InferenceBackendError로 정규화
 * - 재시도 가능 여부 판단 (timeout, 429, 5xx, 네트워크)
 * - 내부 정보 노출 방지 (API 키, 토큰, 경로 등)
 */

import {
  InferenceBackendError,
  type InferenceFailureKind,
} from "@/core/errors/ExtractionErrors";
import { TimeoutError, errorMessage } from "@/utils/async";

/**
 * 민감 정보 패턴 (제거 대상)
 */
const SENSITIVE_PATTERNS = [
  /api[_-]?key[=:]\s*["']?[\w-]+["']?/gi,
  /key[=:]\s*["']?AIza[\w-]+["']?/gi,
  /Bearer\s+[\w.-]+/gi,
  /Authorization[=:]\s*["']?[\w.-]+["']?/gi,
  /\/home\/[\w/]+/gi,
  /\/Users\/[\w/]+/gi,
  /at\s+[\w.]+\s+\(.*:\d+:\d+\)/gi, // stack trace
];

const NETWORK_ERROR_CODES = [
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
  "fetch failed",
  "socket hang up",
];

/**
 * 민감 정보 제거
 */
export function sanitizeMessage(message: string): string {
  let sanitized = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, "[REDACTED]");
  }
  return sanitized;
}

/**
 * Retry-After 헤더 파싱 (초 또는 HTTP date)
 * @returns 대기 시간(ms), 해석 불가 시 undefined
 */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now(),
): number | undefined {
  if (!header) return undefined;

  const seconds = Number(header.trim());
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }

  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }
  return undefined;
}

/**
 * HTTP 상태 코드 → 실패 종류
 */
export function classifyStatus(status: number): InferenceFailureKind {
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limited";
  if (status >= 500) return "server_error";
  if (status === 401 || status === 403) return "auth";
  return "bad_request";
}

/**
 * HTTP 응답 실패 → InferenceBackendError
 */
export function fromHttpStatus(
  backend: string,
  status: number,
  detail: string,
  retryAfterHeader: string | null = null,
): InferenceBackendError {
  const kind = classifyStatus(status);
  return new InferenceBackendError(
    sanitizeMessage(`${backend} request failed: ${status} ${detail}`.trim()),
    kind,
    status,
    kind === "rate_limited" ? parseRetryAfter(retryAfterHeader) : undefined,
  );
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const { status } = error;
    if (typeof status === "number") return status;
  }
  return undefined;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * 임의의 에러 → InferenceBackendError
 *
 * SDK 에러(status 속성), 타임아웃, 네트워크 에러, 메시지 내 상태 코드 순으로 분류
 */
export function parseInferenceError(
  error: unknown,
  backend = "inference",
): InferenceBackendError {
  if (error instanceof InferenceBackendError) {
    return error;
  }

  const message = sanitizeMessage(errorMessage(error));

  if (error instanceof TimeoutError || isAbortError(error)) {
    return new InferenceBackendError(`${backend}: ${message}`, "timeout");
  }

  const status = readStatus(error);
  if (status !== undefined) {
    return new InferenceBackendError(
      `${backend}: ${message}`,
      classifyStatus(status),
      status,
    );
  }

  if (NETWORK_ERROR_CODES.some((code) => message.includes(code))) {
    return new InferenceBackendError(`${backend}: ${message}`, "network");
  }

  if (message.includes("429") || message.includes("RESOURCE_EXHAUSTED")) {
    return new InferenceBackendError(`${backend}: ${message}`, "rate_limited", 429);
  }
  if (/\b50[0-4]\b/.test(message) || message.includes("UNAVAILABLE")) {
    return new InferenceBackendError(`${backend}: ${message}`, "server_error");
  }
  if (
    /\b40[13]\b/.test(message) ||
    message.includes("PERMISSION_DENIED") ||
    message.includes("UNAUTHENTICATED")
  ) {
    return new InferenceBackendError(`${backend}: ${message}`, "auth");
  }
  if (/\b400\b/.test(message) || message.includes("INVALID_ARGUMENT")) {
    return new InferenceBackendError(`${backend}: ${message}`, "bad_request", 400);
  }

  return new InferenceBackendError(`${backend}: ${message}`, "invalid_response");
}
