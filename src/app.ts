/**
 * Express 앱 구성
 *
 * 서버 부팅(listen)과 분리하여 테스트에서 주입된 서비스로 생성 가능
 */

import express, { type Express } from "express";
import cors from "cors";
import { APP_METADATA, SERVER_CONFIG } from "@/config/constants";
import { errorHandler, notFoundHandler } from "@/middleware/errorHandler";
import { requestLogger } from "@/middleware/requestLogger";
import { createV1Router, type V1RouterDeps } from "@/routes/v1";

export interface AppDeps extends V1RouterDeps {
  /** 헬스체크에 노출할 추론 티어 설정 여부 */
  tiers: Record<string, boolean>;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  // 미들웨어
  app.use(cors());
  app.use(express.json({ limit: SERVER_CONFIG.BODY_LIMIT }));
  app.use(requestLogger);

  // 헬스체크 엔드포인트
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      message: `${APP_METADATA.NAME} is running`,
      version: APP_METADATA.VERSION,
      inference: deps.tiers,
    });
  });

  // API v1 라우터
  app.use("/api/v1", createV1Router(deps));

  // 404 핸들러
  app.use(notFoundHandler);

  // 전역 에러 핸들러
  app.use(errorHandler);

  return app;
}
