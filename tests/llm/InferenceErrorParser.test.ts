/**
 * 추론 에러 분류 / 재시도 정책 테스트
 */

import { describe, it, expect } from "@jest/globals";
import { InferenceBackendError } from "@/core/errors/ExtractionErrors";
import {
  classifyStatus,
  fromHttpStatus,
  parseInferenceError,
  parseRetryAfter,
  sanitizeMessage,
} from "@/llm/InferenceErrorParser";
import {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  createRetryPolicy,
} from "@/llm/RetryPolicy";
import { TimeoutError } from "@/utils/async";

describe("InferenceErrorParser", () => {
  describe("classifyStatus", () => {
    it("상태 코드를 실패 종류로 분류해야 함", () => {
      expect(classifyStatus(408)).toBe("timeout");
      expect(classifyStatus(429)).toBe("rate_limited");
      expect(classifyStatus(503)).toBe("server_error");
      expect(classifyStatus(401)).toBe("auth");
      expect(classifyStatus(403)).toBe("auth");
      expect(classifyStatus(404)).toBe("bad_request");
    });
  });

  describe("parseRetryAfter", () => {
    it("초 단위 값을 ms로 변환해야 함", () => {
      expect(parseRetryAfter("2")).toBe(2000);
    });

    it("HTTP date는 현재 시각과의 차이여야 함", () => {
      const now = Date.UTC(2026, 0, 1, 0, 0, 0);
      const header = new Date(now + 5000).toUTCString();

      expect(parseRetryAfter(header, now)).toBe(5000);
    });

    it("해석할 수 없으면 undefined여야 함", () => {
      expect(parseRetryAfter(null)).toBeUndefined();
      expect(parseRetryAfter("soon")).toBeUndefined();
    });
  });

  it("메시지에서 토큰을 제거해야 함", () => {
    expect(sanitizeMessage("failed with Bearer abc.def")).toBe(
      "failed with [REDACTED]",
    );
  });

  it("HTTP 429는 Retry-After를 포함해야 함", () => {
    const error = fromHttpStatus("mistral", 429, "slow down", "3");

    expect(error.kind).toBe("rate_limited");
    expect(error.statusCode).toBe(429);
    expect(error.retryAfterMs).toBe(3000);
    expect(error.message).toBe("mistral request failed: 429 slow down");
    expect(error.retryable).toBe(true);
  });

  describe("parseInferenceError", () => {
    it("이미 분류된 에러는 그대로 반환해야 함", () => {
      const original = new InferenceBackendError("x", "auth");

      expect(parseInferenceError(original)).toBe(original);
    });

    it("타임아웃은 재시도 가능해야 함", () => {
      const parsed = parseInferenceError(new TimeoutError("gemini inference", 10), "gemini");

      expect(parsed.kind).toBe("timeout");
      expect(parsed.retryable).toBe(true);
      expect(parsed.message).toBe("gemini: gemini inference timed out after 10ms");
    });

    it("SDK 에러의 status 속성을 사용해야 함", () => {
      const sdkError = Object.assign(new Error("Too many requests"), { status: 429 });

      expect(parseInferenceError(sdkError).kind).toBe("rate_limited");
    });

    it("네트워크 에러를 인식해야 함", () => {
      expect(parseInferenceError(new TypeError("fetch failed")).kind).toBe("network");
    });

    it("메시지 속 상태 코드를 인식해야 함", () => {
      expect(parseInferenceError(new Error("got 503 from upstream")).kind).toBe(
        "server_error",
      );
      expect(parseInferenceError(new Error("PERMISSION_DENIED")).kind).toBe("auth");
    });

    it("알 수 없는 에러는 재시도 불가 invalid_response여야 함", () => {
      const parsed = parseInferenceError(new Error("something odd"));

      expect(parsed.kind).toBe("invalid_response");
      expect(parsed.retryable).toBe(false);
    });
  });
});

describe("RetryPolicy", () => {
  it("지수 백오프 지연을 계산해야 함", () => {
    const error = new InferenceBackendError("t", "timeout");

    expect(computeBackoffDelay(DEFAULT_RETRY_POLICY, 0, error)).toBe(1000);
    expect(computeBackoffDelay(DEFAULT_RETRY_POLICY, 2, error)).toBe(4000);
  });

  it("Retry-After가 더 길면 우선해야 함", () => {
    const error = new InferenceBackendError("r", "rate_limited", 429, 10000);

    expect(computeBackoffDelay(DEFAULT_RETRY_POLICY, 0, error)).toBe(10000);
  });

  it("최대 지연으로 제한해야 함", () => {
    const policy = createRetryPolicy({ maxDelayMs: 1500 });
    const error = new InferenceBackendError("r", "rate_limited", 429, 60000);

    expect(computeBackoffDelay(policy, 2, error)).toBe(1500);
  });

  it("잘못된 설정은 거부해야 함", () => {
    expect(() => createRetryPolicy({ maxAttempts: 0 })).toThrow(
      "maxAttempts must be a positive integer: 0",
    );
    expect(() => createRetryPolicy({ multiplier: 0.5 })).toThrow();
  });

  it("기본 정책은 일시적 장애만 재시도해야 함", () => {
    expect(
      DEFAULT_RETRY_POLICY.isRetryable(new InferenceBackendError("x", "server_error")),
    ).toBe(true);
    expect(
      DEFAULT_RETRY_POLICY.isRetryable(new InferenceBackendError("x", "bad_request")),
    ).toBe(false);
  });
});
