/**
 * Mistral 추론 백엔드 (호스팅 2순위)
 *
 * Chat Completions REST API 직접 호출
 * - temperature 0, max_tokens 4096
 * - 429 응답은 Retry-After(최소 60초)를 재시도 대기 시간으로 전달
 * - MISTRAL_API_KEY가 설정된 경우에만 가용
 */

import { z } from "zod";
import { logger } from "@/config/logger";
import type { MistralTierConfig } from "@/config/InferenceConfig";
import type { BackendTier } from "@/core/domain/InferenceAttempt";
import { InferenceBackendError } from "@/core/errors/ExtractionErrors";
import type { IInferenceBackend } from "@/core/interfaces/IInferenceBackend";
import {
  fromHttpStatus,
  parseInferenceError,
  parseRetryAfter,
  sanitizeMessage,
} from "@/llm/InferenceErrorParser";

const MAX_TOKENS = 4096;

/** 레이트리밋 최소 대기 시간 */
const MIN_RATE_LIMIT_WAIT_MS = 60000;

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      }),
    )
    .min(1),
});

export class MistralBackend implements IInferenceBackend {
  readonly tier: BackendTier = "hostedSecondary";
  readonly name = "mistral";

  constructor(
    private readonly config: MistralTierConfig | null,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  isAvailable(): boolean {
    return this.config !== null;
  }

  async infer(prompt: string, signal: AbortSignal): Promise<string> {
    if (!this.config) {
      throw new InferenceBackendError("MISTRAL_API_KEY is not configured", "auth");
    }

    logger.debug(
      { model: this.config.model, prompt_length: prompt.length },
      "[MistralBackend] API 호출 시작",
    );

    let response: Response;
    try {
      response = await this.fetchImpl(this.config.apiUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify({
          model: this.config.model,
          messages: [{ role: "user", content: prompt }],
          temperature: 0,
          max_tokens: MAX_TOKENS,
        }),
        signal,
      });
    } catch (error) {
      throw parseInferenceError(error, this.name);
    }

    if (response.status === 429) {
      const retryAfter = parseRetryAfter(response.headers.get("retry-after"));
      throw new InferenceBackendError(
        `${this.name} rate limited`,
        "rate_limited",
        429,
        Math.max(retryAfter ?? 0, MIN_RATE_LIMIT_WAIT_MS),
      );
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw fromHttpStatus(this.name, response.status, sanitizeMessage(detail.slice(0, 200)));
    }

    const parsed = ChatCompletionSchema.safeParse(
      await response.json().catch(() => null),
    );
    if (!parsed.success) {
      throw new InferenceBackendError(
        `${this.name} returned an unexpected payload`,
        "invalid_response",
      );
    }
    return parsed.data.choices[0].message.content;
  }
}
