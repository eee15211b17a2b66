/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 * Request ID, Job ID, URL 추적 지원
 */

import { logger, Logger } from "@/config/logger";

/**
 * Request 전용 로거 생성
 * @param requestId - Request ID (UUID)
 * @param method - HTTP method
 * @param path - 요청 경로
 */
export function createRequestLogger(
  requestId: string,
  method: string,
  path: string,
): Logger {
  return logger.child({
    request_id: requestId,
    method,
    path,
  });
}

/**
 * 추출 Job 전용 로거 생성 (URL 단위)
 * @param jobId - Job ID
 * @param url - 추출 대상 URL
 * @param parent - 상위 로거 (요청 로거 등), 없으면 루트 로거
 */
export function createJobLogger(
  jobId: string,
  url: string,
  parent: Logger = logger,
): Logger {
  return parent.child({
    job_id: jobId,
    url,
  });
}

/**
 * 중요 정보 로깅 (콘솔에 ⭐ 표시)
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}
