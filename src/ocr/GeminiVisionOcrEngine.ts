/**
 * Gemini Vision OCR 엔진
 *
 * 스크린샷 이미지를 Gemini에 전달하여 보이는 텍스트를 줄 단위로 전사
 * 구조화 추출은 하지 않음 (추론 단계의 책임)
 */

import type { GeminiTierConfig } from "@/config/InferenceConfig";
import type { IOcrEngine } from "@/core/interfaces/IOcrEngine";
import {
  createGenAIGenerator,
  type GenAIContentGenerator,
} from "@/llm/backends/GeminiBackend";

const TRANSCRIBE_INSTRUCTION =
  "Transcribe all visible text in this product page screenshot, top to bottom, one line per visual line. " +
  "Keep numbers, currency symbols, strike-through prices and star ratings exactly as shown. " +
  "Output plain text only, without commentary.";

export class GeminiVisionOcrEngine implements IOcrEngine {
  readonly name = "gemini-vision";
  private readonly generator: GenAIContentGenerator;

  constructor(
    private readonly config: GeminiTierConfig,
    generatorFactory: (apiKey: string) => GenAIContentGenerator = createGenAIGenerator,
  ) {
    this.generator = generatorFactory(config.apiKey);
  }

  async extractText(image: Buffer): Promise<string> {
    const response = await this.generator.generateContent({
      model: this.config.model,
      contents: [
        {
          role: "user",
          parts: [
            { inlineData: { mimeType: "image/png", data: image.toString("base64") } },
            { text: TRANSCRIBE_INSTRUCTION },
          ],
        },
      ],
      config: { temperature: 0 },
    });
    return response.text ?? "";
  }
}
