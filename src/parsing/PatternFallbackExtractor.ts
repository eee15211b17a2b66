/**
 * 패턴 기반 폴백 추출기
 *
 * 추론 결과가 없거나 null인 필드에 대해 획득 텍스트(추론 응답 아님)에서
 * 필드별 결정적 정규식 추출을 수행
 *
 * - 사전 정의 필드: 키별 추출 함수
 * - 커스텀 필드: 라벨 라인 추출 (같은 줄의 값, 없으면 다음 비어 있지 않은 줄)
 */

import type { FieldSpec, FieldValue } from "@/core/domain/FieldSpec";
import { NumberParser } from "@/extractors/common/NumberParser";

type PatternExtractor = (text: string) => FieldValue;

const RATING_RANGE = { min: 0, max: 5 };

const MRP_LABEL =
  /(?:\bm\.?\s?r\.?\s?p\b\.?|maximum\s+retail\s+price|list\s+price|original\s+price)/i;

function inRatingRange(value: number): boolean {
  return value >= RATING_RANGE.min && value <= RATING_RANGE.max;
}

// ============================================
// 사전 정의 필드 추출 함수
// ============================================

function extractRating(text: string): FieldValue {
  // "4.3 out of 5", "4.3/5" (OCR: "ou or")
  const outOf = text.match(/(\d+(?:\.\d+)?)\s*(?:out\s+of|ou\s+or|\/)\s*5\b/i);
  if (outOf) {
    const value = Number.parseFloat(outOf[1]);
    if (inRatingRange(value)) return value;
  }

  // OCR로 분리된 소수: "4 . 3 stars"
  const split = text.match(/\b(\d)\s*\.\s*(\d)\s*(?:stars?|★|⭐)/i);
  if (split && Number(split[1]) <= 5) {
    return Number.parseFloat(`${split[1]}.${split[2]}`);
  }

  // "4.3★", "4 ★", "★4.3"
  const star =
    text.match(/(?:^|[^\d.])(\d(?:\.\d)?)\s*(?:★|⭐|☆)/) ??
    text.match(/(?:★|⭐)\s*(\d(?:\.\d)?)(?![\d.])/);
  if (star) {
    const value = Number.parseFloat(star[1]);
    if (value > 0 && inRatingRange(value)) return value;
  }

  // 평점 개수 바로 앞의 평점: "4.2 3,34,015 Ratings"
  const beforeCount = text.match(
    /(?:^|[^\d.,])([0-5](?:\.\d)?)\s+(?=\d[\d,]{2,}\s*ratings?\b)/im,
  );
  if (beforeCount) {
    return Number.parseFloat(beforeCount[1]);
  }

  return null;
}

function extractCount(text: string, label: RegExp, minDigits: number): FieldValue {
  const regex = new RegExp(
    String.raw`(\d{1,3}(?:,\d{2,3})+|\d{1,3}(?:\.\d{3})+|\d+)\s*` + label.source,
    "i",
  );
  const match = text.match(regex);
  if (!match) return null;

  const digits = match[1].replace(/[,.\s]/g, "");
  return digits.length >= minDigits ? Number.parseInt(digits, 10) : null;
}

function extractRatingsCount(text: string): FieldValue {
  return extractCount(text, /rat(?:in|ir)?g?s?\b/, 2);
}

function extractReviewsCount(text: string): FieldValue {
  return extractCount(text, /reviews?\b/, 1);
}

/**
 * 현재가와 정가가 함께 표시된 줄 (통화 금액 2개 이상)
 * 예: "₹592 ₹1,302 54% off"
 */
function pricePair(text: string): [number, number] | null {
  for (const line of text.split("\n")) {
    if (MRP_LABEL.test(line)) continue;
    const amounts = NumberParser.extractCurrencyAmounts(line)
      .map((amount) => NumberParser.parseDecimal(amount))
      .filter((value): value is number => value !== null);
    if (amounts.length >= 2 && amounts[0] !== amounts[1]) {
      return [Math.min(amounts[0], amounts[1]), Math.max(amounts[0], amounts[1])];
    }
  }
  return null;
}

function extractPrice(text: string): FieldValue {
  const labelled = text.match(
    /(?:special|offer|deal|sale|selling)\s+price\s*[:\-]?\s*(?:₹|\brs\.?|\binr|\$|€|£)?\s*(\d[\d,]*(?:\.\d{1,2})?)/i,
  );
  if (labelled) {
    return NumberParser.parseDecimal(labelled[1]);
  }

  const pair = pricePair(text);
  if (pair) return pair[0];

  for (const line of text.split("\n")) {
    if (MRP_LABEL.test(line)) continue;
    const [first] = NumberParser.extractCurrencyAmounts(line);
    if (first !== undefined) {
      return NumberParser.parseDecimal(first);
    }
  }
  return null;
}

function extractMrp(text: string): FieldValue {
  const labelled = text.match(
    new RegExp(
      MRP_LABEL.source +
        String.raw`\s*[:\-]?\s*(?:₹|\brs\.?|\binr|\$|€|£)?\s*(\d[\d,]*(?:\.\d{1,2})?)`,
      "i",
    ),
  );
  if (labelled) {
    return NumberParser.parseDecimal(labelled[1]);
  }

  const pair = pricePair(text);
  return pair ? pair[1] : null;
}

function extractDiscount(text: string): FieldValue {
  const match =
    text.match(/\d{1,2}(?:\.\d+)?\s*%\s*off\b/i) ??
    text.match(/save\s+\d{1,2}(?:\.\d+)?\s*%/i) ??
    text.match(/\d{1,2}(?:\.\d+)?\s*%\s*discount\b/i);
  return match ? match[0].trim() : null;
}

function extractAvailability(text: string): FieldValue {
  const match = text.match(
    /\b(?:only\s+\d+\s+left\s+in\s+stock|out\s+of\s+stock|in\s+stock|currently\s+unavailable|sold\s+out)\b/i,
  );
  return match ? match[0] : null;
}

const PREDEFINED_EXTRACTORS: Readonly<
  Record<string, PatternExtractor | undefined>
> = {
  rating: extractRating,
  ratings_count: extractRatingsCount,
  reviews_count: extractReviewsCount,
  price: extractPrice,
  mrp: extractMrp,
  discount: extractDiscount,
  availability: extractAvailability,
};

// ============================================
// 커스텀 필드 (라벨 라인)
// ============================================

function compact(value: string): string {
  return value.toLowerCase().replace(/[\s_.\-]+/g, "");
}

/**
 * 라벨이 있는 줄 이후의 값 추출
 * - "Operating System: Android 15" → "Android 15"
 * - "Operating System" 다음 줄 "Android 15" → "Android 15"
 */
export function extractLabelledValue(text: string, label: string): string | null {
  const target = compact(label);
  if (target.length === 0) return null;

  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!compact(line).includes(target)) continue;

    const remainder = valueAfterLabel(line, label);
    if (remainder) return remainder;

    for (let j = i + 1; j < lines.length; j++) {
      const next = lines[j].trim();
      if (next.length > 0) return next;
    }
    return null;
  }
  return null;
}

function valueAfterLabel(line: string, label: string): string | null {
  const words = label.split(/\s+/).filter((w) => w.length > 0);
  const pattern = new RegExp(
    words.map((w) => w.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")).join(String.raw`[\s_.\-]*`),
    "i",
  );
  const match = line.match(pattern);
  if (!match || match.index === undefined) return null;

  const rest = line
    .slice(match.index + match[0].length)
    .replace(/^\s*[:\-–]\s*/, "")
    .trim();
  return rest.length > 0 ? rest : null;
}

/**
 * 필드별 패턴 추출
 * @returns 추출 실패 시 null
 */
export function extractByPattern(field: FieldSpec, text: string): FieldValue {
  if (text.length === 0) return null;
  if (field.kind === "custom") {
    return extractLabelledValue(text, field.label);
  }
  const extractor = PREDEFINED_EXTRACTORS[field.key];
  return extractor ? extractor(text) : null;
}

/**
 * 패턴 추출기가 있는 사전 정의 키 목록
 */
export function patternSupportedKeys(): string[] {
  return Object.keys(PREDEFINED_EXTRACTORS);
}
