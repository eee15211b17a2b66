/**
 * OCR 엔진 팩토리
 *
 * OCR_ENGINES 설정 순서대로 엔진 생성
 * 알 수 없는 엔진명이나 자격 증명이 없는 엔진은 경고 후 제외
 */

import { ACQUISITION_CONFIG, OCR_CONFIG } from "@/config/constants";
import type { InferenceConfig } from "@/config/InferenceConfig";
import { logger } from "@/config/logger";
import type { IOcrEngine } from "@/core/interfaces/IOcrEngine";
import { GeminiVisionOcrEngine } from "@/ocr/GeminiVisionOcrEngine";
import { TesseractCliOcrEngine } from "@/ocr/TesseractCliOcrEngine";

export function createOcrEngines(
  inference: InferenceConfig,
  engineNames: readonly string[] = OCR_CONFIG.ENGINES,
): IOcrEngine[] {
  const engines: IOcrEngine[] = [];
  for (const name of engineNames) {
    if (name === "tesseract") {
      engines.push(
        new TesseractCliOcrEngine({ timeoutMs: ACQUISITION_CONFIG.OCR_TIMEOUT_MS }),
      );
    } else if (name === "gemini-vision") {
      if (inference.hostedPrimary) {
        engines.push(new GeminiVisionOcrEngine(inference.hostedPrimary));
      } else {
        logger.warn("[OCR] gemini-vision 엔진은 GEMINI_API_KEY가 필요함, 제외");
      }
    } else {
      logger.warn({ engine: name }, "[OCR] 알 수 없는 OCR 엔진, 제외");
    }
  }
  return engines;
}

export { GeminiVisionOcrEngine, TesseractCliOcrEngine };
