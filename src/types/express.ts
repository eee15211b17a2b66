/**
 * Express Request 타입 확장
 *
 * requestLogger 미들웨어가 요청마다 채움
 */

import type { Logger } from "pino";

declare global {
  namespace Express {
    interface Request {
      /** 응답 헤더 X-Request-Id와 같은 값 */
      id?: string;

      /** request_id/method/path 바인딩된 자식 로거 */
      log?: Logger;

      /**
       * 응답 완료 전에 클라이언트 연결이 끊기면 abort
       * 추출 서비스에 그대로 전달해 단계 경계에서 취소
       */
      abortSignal?: AbortSignal;
    }
  }
}

export {};
