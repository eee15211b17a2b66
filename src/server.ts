/**
 * Product Attribute Extractor 서버
 */

import "dotenv/config";
import { createApp } from "@/app";
import { describeTiers } from "@/config/InferenceConfig";
import { APP_METADATA, SERVER_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import { createExtractionServices } from "@/services/ExtractionServiceFactory";
import { errorMessage } from "@/utils/async";
import { logImportant } from "@/utils/LoggerContext";

const services = createExtractionServices();

const app = createApp({
  registry: services.registry,
  extractor: services.orchestrator,
  batch: services.batch,
  tiers: describeTiers(services.inferenceConfig),
});

// 서버 시작
const server = app.listen(SERVER_CONFIG.PORT, () => {
  logImportant(logger, `${APP_METADATA.NAME} 서버 시작`, {
    port: SERVER_CONFIG.PORT,
    env: process.env.NODE_ENV || "development",
    version: APP_METADATA.VERSION,
  });
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.warn(`${signal} 수신, 서버 종료 중...`);

  server.close(() => {
    logger.info("HTTP 서버 종료");

    // 공유 브라우저 정리
    services
      .close()
      .then(() => {
        logImportant(logger, "서버 종료 완료", {});
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, "리소스 정리 실패");
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
