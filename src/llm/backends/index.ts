/**
 * 추론 백엔드 팩토리
 *
 * 설정된 티어 순서대로 백엔드 생성 (가용성은 각 백엔드가 설정으로 판단)
 */

import type { InferenceConfig } from "@/config/InferenceConfig";
import type { IInferenceBackend } from "@/core/interfaces/IInferenceBackend";
import { GeminiBackend } from "@/llm/backends/GeminiBackend";
import { LocalModelBackend } from "@/llm/backends/LocalModelBackend";
import { MistralBackend } from "@/llm/backends/MistralBackend";

export function createInferenceBackends(
  config: InferenceConfig,
): IInferenceBackend[] {
  return [
    new LocalModelBackend(config.local),
    new GeminiBackend(config.hostedPrimary),
    new MistralBackend(config.hostedSecondary),
  ];
}

export { GeminiBackend, LocalModelBackend, MistralBackend };
