/**
 * 경고 문자열 포맷
 *
 * ExtractionResult.warnings는 "[종류] 메시지" 형태의 문자열 목록
 */

export type WarningKind =
  | "ValidationWarning"
  | "ParsingAmbiguityWarning"
  | "InferenceUnavailableError"
  | "AcquisitionWarning";

export function formatWarning(kind: WarningKind, message: string): string {
  return `[${kind}] ${message}`;
}

export function isWarningOf(kind: WarningKind, warning: string): boolean {
  return warning.startsWith(`[${kind}]`);
}
