/**
 * 추론 티어 설정
 *
 * 환경변수를 1회 파싱하여 티어별 자격 증명/리소스를 명시적으로 열거
 * - 코어 로직(InferenceChain)은 이 객체만 전달받고 환경변수를 직접 읽지 않음
 * - 자격 증명이 없는 티어는 null (가용하지 않음)
 */

import { z } from "zod";
import { createRetryPolicy, type RetryPolicy } from "@/llm/RetryPolicy";

export interface LocalTierConfig {
  baseUrl: string;
  model: string;
}

export interface GeminiTierConfig {
  apiKey: string;
  model: string;
}

export interface MistralTierConfig {
  apiKey: string;
  model: string;
  apiUrl: string;
}

export interface InferenceConfig {
  local: LocalTierConfig | null;
  hostedPrimary: GeminiTierConfig | null;
  hostedSecondary: MistralTierConfig | null;
  retry: RetryPolicy;
  attemptTimeoutMs: number;
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  LOCAL_MODEL_URL: optionalString.pipe(z.string().url().optional()),
  LOCAL_MODEL_NAME: z.string().trim().min(1).default("mistral"),
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().trim().min(1).default("gemini-2.5-flash"),
  MISTRAL_API_KEY: optionalString,
  MISTRAL_MODEL: z.string().trim().min(1).default("mistral-small-latest"),
  MISTRAL_API_URL: z
    .string()
    .url()
    .default("https://api.mistral.ai/v1/chat/completions"),
  INFERENCE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  INFERENCE_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  INFERENCE_MAX_DELAY_MS: z.coerce.number().int().min(0).default(60000),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().min(1000).default(120000),
});

/**
 * 환경변수 → InferenceConfig
 * @throws 형식이 잘못된 값이 있으면 (예: LOCAL_MODEL_URL이 URL이 아님)
 */
export function loadInferenceConfig(
  env: NodeJS.ProcessEnv = process.env,
): InferenceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join(", ");
    throw new Error(`Invalid inference configuration: ${detail}`);
  }
  const values = parsed.data;

  return {
    local: values.LOCAL_MODEL_URL
      ? { baseUrl: values.LOCAL_MODEL_URL, model: values.LOCAL_MODEL_NAME }
      : null,
    hostedPrimary: values.GEMINI_API_KEY
      ? { apiKey: values.GEMINI_API_KEY, model: values.GEMINI_MODEL }
      : null,
    hostedSecondary: values.MISTRAL_API_KEY
      ? {
          apiKey: values.MISTRAL_API_KEY,
          model: values.MISTRAL_MODEL,
          apiUrl: values.MISTRAL_API_URL,
        }
      : null,
    retry: createRetryPolicy({
      maxAttempts: values.INFERENCE_MAX_ATTEMPTS,
      baseDelayMs: values.INFERENCE_BASE_DELAY_MS,
      maxDelayMs: values.INFERENCE_MAX_DELAY_MS,
    }),
    attemptTimeoutMs: values.INFERENCE_TIMEOUT_MS,
  };
}

/**
 * 설정된 티어 요약 (로그용, 자격 증명 제외)
 */
export function describeTiers(config: InferenceConfig): Record<string, boolean> {
  return {
    local: config.local !== null,
    hostedPrimary: config.hostedPrimary !== null,
    hostedSecondary: config.hostedSecondary !== null,
  };
}
