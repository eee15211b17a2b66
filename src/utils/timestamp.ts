/**
 * 타임스탬프 유틸리티
 *
 * SOLID 원칙:
 * - SRP: 타임스탬프 생성만 담당
 */

function pad(value: number, length = 2): string {
  return String(value).padStart(length, "0");
}

/**
 * 타임존 정보가 포함된 타임스탬프 생성
 * ISO 8601 형식 (예: 2025-10-30T12:34:56.789+05:30)
 *
 * TZ 환경 변수 기준 로컬 타임존, 밀리초 단위까지 기록
 */
export function getTimestampWithTimezone(now: Date = new Date()): string {
  const offset = -now.getTimezoneOffset();
  const offsetHours = Math.floor(Math.abs(offset) / 60);
  const offsetMinutes = Math.abs(offset) % 60;
  const offsetSign = offset >= 0 ? "+" : "-";

  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;

  return `${date}T${time}${offsetSign}${pad(offsetHours)}:${pad(offsetMinutes)}`;
}

/**
 * YYYYMMDD 형식의 날짜 문자열 반환 (로그 파일명용)
 */
export function getDateString(now: Date = new Date()): string {
  return `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
}
