/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - 자격 증명(API 키)은 여기가 아닌 InferenceConfig에서만 읽음
 */

/**
 * 애플리케이션 메타데이터
 * ⚠️ package.json의 "version"과 동기화 필수
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Product Attribute Extractor",
} as const;

/**
 * 서버 설정
 */
export const SERVER_CONFIG = {
  /** 환경변수: PORT, 기본값: 3000 */
  PORT: Number(process.env.PORT) || 3000,

  /** JSON body 최대 크기 */
  BODY_LIMIT: "1mb",

  /** CSV 업로드 최대 크기 (bytes) */
  MAX_UPLOAD_BYTES: 5 * 1024 * 1024,
} as const;

/**
 * 텍스트 획득 설정
 *
 * 품질 신호 = 공백 제외 문자 수
 */
export const ACQUISITION_CONFIG = {
  /** DOM 텍스트를 신뢰하기 위한 최소 품질 신호 */
  MIN_DOM_QUALITY: 50,

  /** OCR 결과를 사용할 수 있는 최소 품질 신호 */
  MIN_OCR_QUALITY: 10,

  /** 페이지 캡처 타임아웃 (환경변수: CAPTURE_TIMEOUT_MS) */
  CAPTURE_TIMEOUT_MS: Number(process.env.CAPTURE_TIMEOUT_MS) || 60000,

  /** DOM 직접 요청 타임아웃 (환경변수: DOM_FETCH_TIMEOUT_MS) */
  DOM_FETCH_TIMEOUT_MS: Number(process.env.DOM_FETCH_TIMEOUT_MS) || 20000,

  /** OCR 엔진별 타임아웃 (환경변수: OCR_TIMEOUT_MS) */
  OCR_TIMEOUT_MS: Number(process.env.OCR_TIMEOUT_MS) || 90000,
} as const;

/**
 * 브라우저 캡처 설정
 */
export const BROWSER_CONFIG = {
  HEADLESS: process.env.HEADLESS !== "false",
  VIEWPORT: { width: 1280, height: 2000 },
  USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
  LOCALE: "en-IN",
  /** networkidle 대기 상한 (실패해도 계속 진행) */
  NETWORK_IDLE_TIMEOUT_MS: 10000,
  /** 스크린샷 보관 디렉토리 (환경변수: SCREENSHOT_DIR, 미설정 시 저장 안 함) */
  SCREENSHOT_DIR: process.env.SCREENSHOT_DIR || null,
} as const;

/**
 * OCR 설정
 */
export const OCR_CONFIG = {
  /** 환경변수: OCR_ENGINES (콤마 구분), 기본값: tesseract */
  ENGINES: (process.env.OCR_ENGINES || "tesseract")
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0),

  TESSERACT_BINARY: process.env.TESSERACT_BINARY || "tesseract",

  /** 단일 텍스트 블록 모드 */
  TESSERACT_PSM: 6,
} as const;

/**
 * 배치 처리 설정
 */
export const BATCH_CONFIG = {
  /** 호출자가 지정할 수 있는 최대 동시성 (환경변수: MAX_BATCH_CONCURRENCY) */
  MAX_CONCURRENCY: Number(process.env.MAX_BATCH_CONCURRENCY) || 5,

  DEFAULT_CONCURRENCY: 2,

  /** 한 번에 받을 수 있는 최대 URL 수 */
  MAX_URLS: 100,
} as const;
