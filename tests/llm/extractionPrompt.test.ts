/**
 * 추출 프롬프트 빌더 테스트
 */

import { describe, it, expect } from "@jest/globals";
import {
  buildExtractionPrompt,
  buildExtractionPromptSections,
} from "@/llm/prompts/extractionPrompt";
import { acquired, testRegistry } from "../helpers/fakes";

describe("buildExtractionPrompt", () => {
  const registry = testRegistry();
  const text = acquired("Rating: 4.3 out of 5\nOperating System: Android 15");

  it("획득 텍스트를 자르지 않고 구분자 사이에 그대로 포함해야 함", () => {
    const sections = buildExtractionPromptSections(
      registry.resolveAll(["rating"]),
      text,
    );

    expect(sections.text).toBe(
      "=== PAGE TEXT START ===\nRating: 4.3 out of 5\nOperating System: Android 15\n=== PAGE TEXT END ===",
    );
  });

  it("매우 긴 텍스트도 전부 포함해야 함", () => {
    const long = acquired("x".repeat(50000));
    const prompt = buildExtractionPrompt(registry.resolveAll(["review"]), long);

    expect(prompt.includes("x".repeat(50000))).toBe(true);
  });

  it("필드 블록은 요청 순서를 따르고 순서만 바뀌어야 함", () => {
    const forward = buildExtractionPromptSections(
      registry.resolveAll(["rating", "Operating System"]),
      text,
    );
    const reversed = buildExtractionPromptSections(
      registry.resolveAll(["Operating System", "rating"]),
      text,
    );

    expect(forward.fieldBlocks[0].startsWith('### Field "rating" (decimal)')).toBe(true);
    expect(reversed.fieldBlocks).toEqual([...forward.fieldBlocks].reverse());
  });

  it("마무리 섹션에 요청 필드명 그대로의 JSON 골격이 있어야 함", () => {
    const sections = buildExtractionPromptSections(
      registry.resolveAll(["rating", "Operating System"]),
      text,
    );

    expect(sections.closing).toContain(
      '{\n  "rating": <decimal or null>,\n  "Operating System": <string or null>\n}',
    );
  });

  it("필드 예시가 있으면 Example 줄을 포함해야 함", () => {
    const [block] = buildExtractionPromptSections(
      registry.resolveAll(["mrp"]),
      text,
    ).fieldBlocks;

    expect(block.split("\n").pop()).toBe("Example: ₹1,302");
  });

  it("필드가 없으면 아무 속성이나 source 키와 함께 요청해야 함", () => {
    const sections = buildExtractionPromptSections([], text);

    expect(sections.fieldBlocks).toEqual([]);
    expect(sections.closing).toContain('Add a "source" key');
  });

  it("OCR 텍스트면 인식 오류 가능성을 알려야 함", () => {
    const sections = buildExtractionPromptSections(
      [],
      acquired("4 3 ★", "ocr"),
    );

    expect(sections.header).toContain("comes from OCR of a page screenshot");
  });

  it("같은 입력이면 같은 프롬프트를 생성해야 함", () => {
    const fields = registry.resolveAll(["price", "mrp"]);

    expect(buildExtractionPrompt(fields, text)).toBe(
      buildExtractionPrompt(fields, text),
    );
  });
});
