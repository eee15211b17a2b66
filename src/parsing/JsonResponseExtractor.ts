/**
 * 추론 응답 JSON 추출기
 *
 * 모델 응답(산문 + 코드 블록 혼재)에서 JSON 객체 1개를 찾아 디코드
 * 1. ```json 코드 블록
 * 2. 첫 번째 '{'부터 문자열을 고려한 중괄호 짝 맞추기
 * 3. 복구: 끝의 쉼표 제거, 닫히지 않은 중괄호/대괄호 보충 (응답이 잘린 경우)
 */

export type JsonExtractionStrategy = "fenced" | "balanced" | "repaired";

export interface JsonExtraction {
  object: Record<string, unknown> | null;
  strategy: JsonExtractionStrategy | null;
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/gi;

function toRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

function tryParse(candidate: string): Record<string, unknown> | null {
  try {
    return toRecord(JSON.parse(candidate));
  } catch {
    return null;
  }
}

/**
 * start 위치의 '{'와 짝이 맞는 '}' 인덱스 (문자열 내부 괄호 무시)
 * 짝이 없으면 -1
 */
export function findMatchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * 잘리거나 약간 손상된 JSON 복구
 */
export function repairJson(candidate: string): string {
  let repaired = candidate.trim().replace(/,\s*$/, "");

  const closers: string[] = [];
  let inString = false;
  let escaped = false;
  for (const ch of repaired) {
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") closers.push("}");
    else if (ch === "[") closers.push("]");
    else if (ch === "}" || ch === "]") closers.pop();
  }

  if (inString) {
    repaired += '"';
  }
  repaired = repaired.replace(/,\s*$/, "") + closers.reverse().join("");
  // 닫는 괄호 앞의 쉼표 제거
  return repaired.replace(/,(\s*[}\]])/g, "$1");
}

function fromCandidate(
  candidate: string,
  strategy: JsonExtractionStrategy,
): JsonExtraction | null {
  const direct = tryParse(candidate);
  if (direct) {
    return { object: direct, strategy };
  }
  const repaired = tryParse(repairJson(candidate));
  return repaired ? { object: repaired, strategy: "repaired" } : null;
}

/**
 * 응답 텍스트에서 JSON 객체 추출
 */
export function extractJsonObject(text: string): JsonExtraction {
  for (const match of text.matchAll(FENCED_BLOCK)) {
    const body = match[1].trim();
    const start = body.indexOf("{");
    if (start === -1) continue;
    const end = findMatchingBrace(body, start);
    const found = fromCandidate(
      end === -1 ? body.slice(start) : body.slice(start, end + 1),
      "fenced",
    );
    if (found) return found;
  }

  // 닫히지 않은 코드 블록 (응답이 잘린 경우) 포함, 전체 텍스트 스캔
  let start = text.indexOf("{");
  while (start !== -1) {
    const end = findMatchingBrace(text, start);
    if (end === -1) {
      const found = fromCandidate(text.slice(start).replace(/```\s*$/, ""), "balanced");
      if (found) return found;
      break;
    }

    const found = fromCandidate(text.slice(start, end + 1), "balanced");
    if (found) return found;
    start = text.indexOf("{", start + 1);
  }

  return { object: null, strategy: null };
}
