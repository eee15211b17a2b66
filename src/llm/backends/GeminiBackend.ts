/**
 * Gemini 추론 백엔드 (호스팅 1순위)
 *
 * @google/genai 공식 SDK 사용
 * - temperature 0, thinking 비활성화 (2.5 모델)
 * - GEMINI_API_KEY가 설정된 경우에만 가용
 */

import { GoogleGenAI } from "@google/genai";
import type { GenerateContentParameters } from "@google/genai";
import { logger } from "@/config/logger";
import type { GeminiTierConfig } from "@/config/InferenceConfig";
import type { BackendTier } from "@/core/domain/InferenceAttempt";
import { InferenceBackendError } from "@/core/errors/ExtractionErrors";
import type { IInferenceBackend } from "@/core/interfaces/IInferenceBackend";
import { parseInferenceError } from "@/llm/InferenceErrorParser";

/** 최대 출력 토큰 수 */
const MAX_OUTPUT_TOKENS = 8192;

/**
 * generateContent 호출부 (테스트 주입용 최소 인터페이스)
 */
export interface GenAIContentGenerator {
  generateContent(
    params: GenerateContentParameters,
  ): Promise<{ text?: string | undefined }>;
}

export function createGenAIGenerator(apiKey: string): GenAIContentGenerator {
  return new GoogleGenAI({ apiKey }).models;
}

export class GeminiBackend implements IInferenceBackend {
  readonly tier: BackendTier = "hostedPrimary";
  readonly name = "gemini";
  private generator: GenAIContentGenerator | null = null;

  constructor(
    private readonly config: GeminiTierConfig | null,
    private readonly generatorFactory: (
      apiKey: string,
    ) => GenAIContentGenerator = createGenAIGenerator,
  ) {}

  isAvailable(): boolean {
    return this.config !== null;
  }

  async infer(prompt: string, signal: AbortSignal): Promise<string> {
    if (!this.config) {
      throw new InferenceBackendError("GEMINI_API_KEY is not configured", "auth");
    }
    if (!this.generator) {
      this.generator = this.generatorFactory(this.config.apiKey);
    }

    const { model } = this.config;
    logger.debug(
      { model, prompt_length: prompt.length },
      "[GeminiBackend] API 호출 시작",
    );

    let text: string | undefined;
    try {
      const response = await this.generator.generateContent({
        model,
        contents: prompt,
        config: {
          temperature: 0,
          maxOutputTokens: MAX_OUTPUT_TOKENS,
          abortSignal: signal,
          ...(model.includes("2.5")
            ? { thinkingConfig: { thinkingBudget: 0 } }
            : {}),
        },
      });
      text = response.text;
    } catch (error) {
      throw parseInferenceError(error, this.name);
    }

    if (!text) {
      throw new InferenceBackendError(
        `${this.name} response has no text`,
        "invalid_response",
      );
    }
    return text;
  }
}
