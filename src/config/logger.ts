/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 다중 출력 (콘솔 + 파일)
 * - 일일 로그 로테이션 (logs/extractor-YYYYMMDD.log)
 * - 에러 로그 별도 파일 (logs/error-YYYYMMDD.log)
 * - 구조화된 JSON 로깅
 *
 * 콘솔 출력:
 * - 개발 환경 + LOG_PRETTY=true: 색상 포맷
 * - 그 외: JSON 포맷
 *
 * 테스트 환경(NODE_ENV=test)에서는 파일 스트림을 만들지 않음
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream } from "rotating-file-stream";
import path from "path";
import { getDateString, getTimestampWithTimezone } from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const IS_TEST = NODE_ENV === "test";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (IS_TEST ? "silent" : NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";

/**
 * 일일 로테이션 파일 스트림 생성
 * 파일명: {prefix}-YYYYMMDD.log
 */
function createRotatingStream(prefix: string) {
  return createStream(
    (time: number | Date | null) => {
      const date = time === null ? new Date() : new Date(time);
      return `${prefix}-${getDateString(date)}.log`;
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      path: LOG_DIR,
      maxFiles: 30,
      maxSize: "100M",
    },
  );
}

/**
 * 레벨별 파일 라우팅 스트림
 * skip_file_log 플래그가 있는 로그는 파일에 저장하지 않음
 */
class FileRoutingStream implements DestinationStream {
  private readonly mainStream = createRotatingStream("extractor");
  private readonly errorStream = createRotatingStream("error");

  write(chunk: string): boolean {
    const entry = parseLogLine(chunk);
    if (entry?.skip_file_log === true) {
      return true;
    }

    if (entry && (entry.level === "error" || entry.level === "fatal")) {
      this.errorStream.write(chunk);
    }
    this.mainStream.write(chunk);
    return true;
  }
}

function parseLogLine(chunk: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(chunk);
    return typeof parsed === "object" && parsed !== null
      ? Object.fromEntries(Object.entries(parsed))
      : null;
  } catch {
    // JSON이 아닌 라인은 메인 파일에만 기록
    return null;
  }
}

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
} as const;

const shouldLogToConsole = (level: number): boolean => {
  const threshold =
    LOG_LEVEL === "debug" || LOG_LEVEL === "trace"
      ? LOG_LEVELS.DEBUG
      : LOG_LEVEL === "info"
        ? LOG_LEVELS.INFO
        : LOG_LEVEL === "warn"
          ? LOG_LEVELS.WARN
          : LOG_LEVELS.ERROR;
  return level >= threshold;
};

type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR
      ? "\x1b[31m"
      : level >= LOG_LEVELS.WARN
        ? "\x1b[33m"
        : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : level >= LOG_LEVELS.INFO
          ? "INFO"
          : "DEBUG";
  const star = logObj.important ? " ⭐" : "";

  console.error(
    `[${time}] ${levelColor}${levelText}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`,
  );

  const excludedFields = ["msg", "important", "skip_file_log"];
  for (const [field, raw] of Object.entries(logObj)) {
    if (excludedFields.includes(field)) continue;
    const value =
      typeof raw === "object" && raw !== null
        ? JSON.stringify(raw, null, 2)
            .split("\n")
            .map((l) => "  " + l)
            .join("\n")
        : String(raw);
    console.error(`  ${field}: ${value}`);
  }
};

/**
 * 프로덕션 환경용 콘솔 포맷터 (JSON)
 * stdout은 CLI 결과 출력에 쓰이므로 stderr로 기록
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.error(JSON.stringify({ ...logObj, level }));
};

/**
 * 콘솔 출력 Hook 생성 함수
 * Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = {};

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, first);
        if (typeof second === "string") {
          logObj.msg = second;
        }
      }

      if (shouldLogToConsole(level)) {
        formatter(logObj, level);
      }
    },
  };
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "product_extractor",
    env: NODE_ENV,
  },
};

function createLogger(): pino.Logger {
  if (IS_TEST) {
    return pino(baseConfig);
  }

  const hooks = createConsoleHook(
    NODE_ENV === "development" && LOG_PRETTY
      ? formatConsolePretty
      : formatConsoleJson,
  );
  const streams: pino.StreamEntry[] = [
    { level: "debug", stream: new FileRoutingStream() },
  ];
  return pino({ ...baseConfig, hooks }, pino.multistream(streams));
}

/**
 * 메인 로거 인스턴스
 */
export const logger = createLogger();

export type Logger = pino.Logger;
