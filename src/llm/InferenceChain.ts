/**
 * Inference Invocation Chain
 *
 * 추론 백엔드를 고정 우선순위(local → hostedPrimary → hostedSecondary)로 시도
 * - 가용하지 않은 티어는 시도 기록 없이 건너뜀
 * - 티어별 재시도: 일시적 장애만 지수 백오프로 재시도, 그 외는 즉시 다음 티어
 * - 첫 성공에서 종료, 모두 실패하면 succeeded=false 시도 목록 반환
 * - 시도마다 독립 타임아웃
 */

import type { Logger } from "@/config/logger";
import {
  BACKEND_TIER_ORDER,
  type InferenceAttempt,
} from "@/core/domain/InferenceAttempt";
import { InferenceBackendError } from "@/core/errors/ExtractionErrors";
import type { IInferenceBackend } from "@/core/interfaces/IInferenceBackend";
import { parseInferenceError } from "@/llm/InferenceErrorParser";
import {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  type RetryPolicy,
} from "@/llm/RetryPolicy";
import { sleep as defaultSleep, withTimeout } from "@/utils/async";

export interface InferenceChainOptions {
  backends: readonly IInferenceBackend[];
  logger: Logger;
  retryPolicy?: RetryPolicy;
  /** 시도별 타임아웃 (ms) */
  attemptTimeoutMs?: number;
  /** 테스트용 시계/대기 주입 */
  clock?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const DEFAULT_ATTEMPT_TIMEOUT_MS = 120000;

export class InferenceChain {
  private readonly backends: readonly IInferenceBackend[];
  private readonly policy: RetryPolicy;
  private readonly attemptTimeoutMs: number;
  private readonly clock: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: InferenceChainOptions) {
    // 티어 순서로 정렬 (같은 티어는 등록 순서 유지)
    this.backends = [...options.backends].sort(
      (a, b) =>
        BACKEND_TIER_ORDER.indexOf(a.tier) - BACKEND_TIER_ORDER.indexOf(b.tier),
    );
    this.policy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.attemptTimeoutMs =
      options.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger;
  }

  /**
   * 가용 티어 목록 (진단용)
   */
  availableBackends(): IInferenceBackend[] {
    return this.backends.filter((backend) => backend.isAvailable());
  }

  /**
   * 지시문 추론
   * @param signal - 취소 시 백오프 대기를 끊고 다음 시도 전에 중단 (진행 중인 호출은 타임아웃까지 유지)
   */
  async invoke(
    instruction: string,
    signal?: AbortSignal,
  ): Promise<InferenceAttempt[]> {
    const attempts: InferenceAttempt[] = [];

    for (const backend of this.backends) {
      if (!backend.isAvailable()) {
        this.logger.debug(
          { tier: backend.tier, backend: backend.name },
          "[InferenceChain] 미설정 티어 건너뜀",
        );
        continue;
      }

      const succeeded = await this.runTier(
        backend,
        instruction,
        attempts,
        signal,
      );
      if (succeeded || signal?.aborted) {
        return attempts;
      }
    }

    this.logger.warn(
      { attempts: attempts.length },
      "[InferenceChain] 모든 추론 티어 실패 또는 미설정",
    );
    return attempts;
  }

  private async runTier(
    backend: IInferenceBackend,
    instruction: string,
    attempts: InferenceAttempt[],
    signal?: AbortSignal,
  ): Promise<boolean> {
    const tierStart = this.clock();

    for (let index = 0; index < this.policy.maxAttempts; index++) {
      if (signal?.aborted) {
        return false;
      }

      try {
        const response = await this.callOnce(backend, instruction);
        attempts.push({
          backendTier: backend.tier,
          prompt: instruction,
          rawResponse: response,
          succeeded: true,
          retryCount: index,
          elapsedMs: this.clock() - tierStart,
          error: null,
        });
        this.logger.info(
          { tier: backend.tier, backend: backend.name, retry_count: index },
          "[InferenceChain] 추론 성공",
        );
        return true;
      } catch (error) {
        const failure = parseInferenceError(error, backend.name);
        attempts.push({
          backendTier: backend.tier,
          prompt: instruction,
          rawResponse: null,
          succeeded: false,
          retryCount: index,
          elapsedMs: this.clock() - tierStart,
          error: failure.message,
        });

        const hasNext = index + 1 < this.policy.maxAttempts;
        if (!this.policy.isRetryable(failure) || !hasNext) {
          this.logger.warn(
            {
              tier: backend.tier,
              backend: backend.name,
              kind: failure.kind,
              status: failure.statusCode,
              retry_count: index,
            },
            "[InferenceChain] 티어 포기, 다음 티어 진행",
          );
          return false;
        }

        const delay = computeBackoffDelay(this.policy, index, failure);
        this.logger.warn(
          {
            tier: backend.tier,
            backend: backend.name,
            kind: failure.kind,
            retry_count: index,
            delay_ms: delay,
          },
          "[InferenceChain] 일시적 실패, 백오프 후 재시도",
        );
        await this.sleep(delay, signal);
      }
    }
    return false;
  }

  /**
   * 단일 호출 (시도별 타임아웃 + abort 신호)
   */
  private async callOnce(
    backend: IInferenceBackend,
    instruction: string,
  ): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.attemptTimeoutMs);
    try {
      const response = await withTimeout(
        backend.infer(instruction, controller.signal),
        this.attemptTimeoutMs,
        `${backend.name} inference`,
      );
      if (response.trim().length === 0) {
        throw new InferenceBackendError(
          `${backend.name} returned an empty response`,
          "invalid_response",
        );
      }
      return response;
    } finally {
      clearTimeout(timer);
    }
  }
}
