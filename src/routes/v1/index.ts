/**
 * API v1 메인 라우터
 *
 * SOLID 원칙:
 * - SRP: 라우터 조립만 담당
 * - DIP: 서비스는 주입받음 (테스트에서 fake 사용)
 */

import { Router } from "express";
import { logger } from "@/config/logger";
import type { FieldSchemaRegistry } from "@/fields/FieldSchemaRegistry";
import { createExtractRouter, type ExtractRouterDeps } from "./extract.router";
import { createFieldsRouter } from "./fields.router";

export interface V1RouterDeps extends ExtractRouterDeps {
  registry: FieldSchemaRegistry;
}

export function createV1Router(deps: V1RouterDeps): Router {
  const router = Router();

  router.use("/fields", createFieldsRouter(deps.registry));
  router.use("/extract", createExtractRouter(deps));

  logger.debug(
    {
      endpoints: [
        "GET /api/v1/fields",
        "POST /api/v1/extract",
        "POST /api/v1/extract/batch",
        "POST /api/v1/extract/upload-csv",
      ],
    },
    "[v1Router] API v1 라우터 등록",
  );

  return router;
}
