/**
 * 에러 핸들러 미들웨어
 * Express 전역 에러 처리
 *
 * 응답 형태: { success: false, error: { code, message } }
 */

import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { getRequestLogger } from "@/middleware/requestLogger";

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "UPLOAD_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

/**
 * 에러 응답 전송
 */
export function sendError(
  res: Response,
  status: number,
  code: ApiErrorCode,
  message: string,
): void {
  res.status(status).json({ success: false, error: { code, message } });
}

/**
 * 전역 에러 핸들러
 * Express는 인자 4개로 에러 핸들러를 구분하므로 next는 사용하지 않아도 유지
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const log = getRequestLogger(req);

  if (err instanceof multer.MulterError) {
    log.warn({ code: err.code, field: err.field }, "업로드 거부");
    sendError(res, 400, "UPLOAD_ERROR", err.message);
    return;
  }

  // express.json 파싱 실패
  if (err instanceof SyntaxError) {
    log.warn({ error: err.message }, "잘못된 JSON 본문");
    sendError(res, 400, "VALIDATION_ERROR", "Malformed JSON body");
    return;
  }

  log.error(
    {
      error: { message: err.message, stack: err.stack, name: err.name },
    },
    "처리되지 않은 오류",
  );
  sendError(res, 500, "INTERNAL_ERROR", err.message);
}

/**
 * 404 핸들러
 */
export function notFoundHandler(req: Request, res: Response): void {
  getRequestLogger(req).warn("경로를 찾을 수 없음");
  sendError(res, 404, "NOT_FOUND", `Route not found: ${req.method} ${req.path}`);
}
