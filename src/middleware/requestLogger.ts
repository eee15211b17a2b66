/**
 * Request Logger 미들웨어
 *
 * 기능:
 * - Request ID 생성 및 추적
 * - 응답 시간 측정
 * - 응답 전 연결 종료 시 요청 abort 신호 발생
 * - Health check 요청은 파일 로그 제외 (콘솔만)
 */

import type { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { logger as rootLogger, type Logger } from "@/config/logger";
import "@/types/express";
import { createRequestLogger } from "@/utils/LoggerContext";

/**
 * 파일 로그에서 제외할 경로 목록
 */
const SKIP_FILE_LOG_PATHS = ["/health"];

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const requestId = uuidv4();
  const startTime = Date.now();
  const skipFileLog = SKIP_FILE_LOG_PATHS.includes(req.path);

  const log = createRequestLogger(requestId, req.method, req.path);
  const controller = new AbortController();
  req.log = log;
  req.id = requestId;
  req.abortSignal = controller.signal;
  res.setHeader("X-Request-Id", requestId);

  log.info({ ip: req.ip, skip_file_log: skipFileLog }, "요청 수신");

  res.on("close", () => {
    if (!res.writableEnded) {
      log.warn("응답 전 연결 종료, 요청 취소");
      controller.abort();
    }
  });

  res.on("finish", () => {
    const duration = Date.now() - startTime;
    const logLevel = res.statusCode >= 400 ? "error" : "info";

    log[logLevel](
      {
        status: res.statusCode,
        duration_ms: duration,
        skip_file_log: skipFileLog,
      },
      "요청 완료",
    );
  });

  next();
}

/**
 * 요청 로거 조회 (미들웨어 미적용 시 루트 로거)
 */
export function getRequestLogger(req: Request): Logger {
  return req.log ?? rootLogger;
}

/**
 * 요청 취소 신호 (미들웨어 미적용 시 취소되지 않는 신호)
 */
export function getRequestSignal(req: Request): AbortSignal {
  return req.abortSignal ?? new AbortController().signal;
}
