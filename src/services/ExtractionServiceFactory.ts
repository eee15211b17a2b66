/**
 * Extraction Service Factory
 *
 * 설정(환경변수/YAML) → 실제 어댑터 조립
 * 서버와 CLI가 같은 구성을 공유
 */

import type { Logger } from "@/config/logger";
import { logger as rootLogger } from "@/config/logger";
import {
  describeTiers,
  loadInferenceConfig,
  type InferenceConfig,
} from "@/config/InferenceConfig";
import type { IPageCapturer } from "@/core/interfaces/IPageCapturer";
import { TextAcquisitionStrategy } from "@/acquisition/TextAcquisitionStrategy";
import {
  FieldSchemaRegistry,
  getFieldSchemaRegistry,
} from "@/fields/FieldSchemaRegistry";
import { InferenceChain } from "@/llm/InferenceChain";
import { createInferenceBackends } from "@/llm/backends";
import { createOcrEngines } from "@/ocr";
import { DomTextExtractor } from "@/scrapers/DomTextExtractor";
import { PlaywrightPageCapturer } from "@/scrapers/controllers/PlaywrightPageCapturer";
import { BatchExtractionService } from "@/services/BatchExtractionService";
import { ExtractionOrchestrator } from "@/services/ExtractionOrchestrator";

export interface ExtractionServices {
  registry: FieldSchemaRegistry;
  orchestrator: ExtractionOrchestrator;
  batch: BatchExtractionService;
  inferenceConfig: InferenceConfig;
  /** 브라우저 등 공유 리소스 정리 */
  close(): Promise<void>;
}

export function createExtractionServices(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = rootLogger,
): ExtractionServices {
  const inferenceConfig = loadInferenceConfig(env);
  const registry = getFieldSchemaRegistry();
  const capturer: IPageCapturer = new PlaywrightPageCapturer();

  const acquisition = new TextAcquisitionStrategy({
    capturer,
    domAdapter: new DomTextExtractor(),
    ocrEngines: createOcrEngines(inferenceConfig),
    logger,
  });

  const inference = new InferenceChain({
    backends: createInferenceBackends(inferenceConfig),
    logger,
    retryPolicy: inferenceConfig.retry,
    attemptTimeoutMs: inferenceConfig.attemptTimeoutMs,
  });

  const orchestrator = new ExtractionOrchestrator({
    registry,
    acquisition,
    inference,
    logger,
  });

  logger.info(
    { tiers: describeTiers(inferenceConfig) },
    "[Services] 추출 서비스 구성 완료",
  );

  return {
    registry,
    orchestrator,
    batch: new BatchExtractionService(orchestrator, { logger }),
    inferenceConfig,
    close: () => capturer.close(),
  };
}
