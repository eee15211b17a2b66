/**
 * 추출 프롬프트 빌더 (Instruction Builder)
 *
 * 필드 스펙 + 획득 텍스트 → 단일 추출 지시문
 * - 순수 함수, 동일 입력이면 동일 출력
 * - 필드 블록은 요청 순서대로 (블록 순서 외에는 내용이 바뀌지 않음)
 * - 획득 텍스트는 절대 자르지 않음
 */

import type { AcquiredText } from "@/core/domain/AcquiredText";
import type { FieldSpec, FieldValueType } from "@/core/domain/FieldSpec";

export interface ExtractionPromptSections {
  header: string;
  fieldBlocks: string[];
  text: string;
  closing: string;
}

const TEXT_START = "=== PAGE TEXT START ===";
const TEXT_END = "=== PAGE TEXT END ===";

const ORIGIN_NOTES: Record<AcquiredText["origin"], string> = {
  dom: "The page text below was taken from the rendered page markup.",
  ocr: "The page text below comes from OCR of a page screenshot and may contain recognition errors, split digits and joined words.",
};

const PLACEHOLDERS: Record<FieldValueType, string> = {
  decimal: "<decimal or null>",
  integer: "<integer or null>",
  string: "<string or null>",
};

function renderFieldBlock(field: FieldSpec): string {
  const lines = [
    `### Field ${JSON.stringify(field.name)} (${field.valueType})`,
    field.description,
    ...field.extractionRules.map((rule) => `- ${rule}`),
  ];
  if (field.example !== null) {
    lines.push(`Example: ${field.example}`);
  }
  return lines.join("\n");
}

function renderClosing(fields: readonly FieldSpec[]): string {
  if (fields.length === 0) {
    return [
      "Return ONLY a single JSON object containing every product attribute you can confidently find in the text (for example product_name, price, mrp, rating, ratings_count, reviews_count).",
      'Add a "source" key set to "dom" or "ocr" describing where the text came from.',
      "Do not add explanations or comments.",
    ].join("\n");
  }

  const skeleton = fields
    .map((f) => `  ${JSON.stringify(f.name)}: ${PLACEHOLDERS[f.valueType]}`)
    .join(",\n");
  return [
    "Return ONLY a single JSON object whose keys are exactly the requested field names below, and nothing else:",
    `{\n${skeleton}\n}`,
    "Use null for any field you cannot find. Do not add explanations, comments or extra keys.",
  ].join("\n");
}

/**
 * 프롬프트 섹션 구성 (테스트/디버그용)
 */
export function buildExtractionPromptSections(
  fields: readonly FieldSpec[],
  text: AcquiredText,
): ExtractionPromptSections {
  const header = [
    "You extract structured product attributes from the text of an e-commerce product page.",
    ORIGIN_NOTES[text.origin],
    fields.length > 0
      ? "Follow the rules given for each requested field."
      : "No specific fields were requested.",
  ].join("\n");

  return {
    header,
    fieldBlocks: fields.map(renderFieldBlock),
    text: `${TEXT_START}\n${text.content}\n${TEXT_END}`,
    closing: renderClosing(fields),
  };
}

/**
 * 추출 지시문 생성
 */
export function buildExtractionPrompt(
  fields: readonly FieldSpec[],
  text: AcquiredText,
): string {
  const sections = buildExtractionPromptSections(fields, text);
  return [
    sections.header,
    ...sections.fieldBlocks,
    sections.text,
    sections.closing,
  ].join("\n\n");
}
