/**
 * 로컬 모델 추론 백엔드 (Ollama 호환 /api/generate)
 *
 * - 외부 의존 없음, 가장 먼저 시도되는 티어
 * - LOCAL_MODEL_URL이 설정된 경우에만 가용
 */

import { z } from "zod";
import { logger } from "@/config/logger";
import type { LocalTierConfig } from "@/config/InferenceConfig";
import type { BackendTier } from "@/core/domain/InferenceAttempt";
import { InferenceBackendError } from "@/core/errors/ExtractionErrors";
import type { IInferenceBackend } from "@/core/interfaces/IInferenceBackend";
import { fromHttpStatus, parseInferenceError } from "@/llm/InferenceErrorParser";

const GenerateResponseSchema = z.object({
  response: z.string(),
});

export class LocalModelBackend implements IInferenceBackend {
  readonly tier: BackendTier = "local";
  readonly name = "local-model";

  constructor(
    private readonly config: LocalTierConfig | null,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  isAvailable(): boolean {
    return this.config !== null;
  }

  async infer(prompt: string, signal: AbortSignal): Promise<string> {
    if (!this.config) {
      throw new InferenceBackendError("Local model is not configured", "auth");
    }

    const endpoint = new URL("/api/generate", this.config.baseUrl);
    logger.debug(
      { model: this.config.model, prompt_length: prompt.length },
      "[LocalModel] API 호출 시작",
    );

    let response: Response;
    try {
      response = await this.fetchImpl(endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.config.model,
          prompt,
          stream: false,
          options: { temperature: 0 },
        }),
        signal,
      });
    } catch (error) {
      throw parseInferenceError(error, this.name);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw fromHttpStatus(
        this.name,
        response.status,
        detail.slice(0, 200),
        response.headers.get("retry-after"),
      );
    }

    const parsed = GenerateResponseSchema.safeParse(
      await response.json().catch(() => null),
    );
    if (!parsed.success) {
      throw new InferenceBackendError(
        `${this.name} returned an unexpected payload`,
        "invalid_response",
      );
    }
    return parsed.data.response;
  }
}
