/**
 * NumberParser Utility
 *
 * 목적: 로케일에 무관한 숫자 텍스트 파싱
 * 패턴: Utility Class (Static Methods)
 *
 * 지원 형식:
 * - "₹1,302" → 1302, "Rs. 1,299.00" → 1299
 * - 인도식 그룹핑 "3,34,015" → 334015
 * - 유럽식 "1.299,50" → 1299.5
 */

/** 첫 번째 숫자 토큰 (부호 포함, 구분자 포함) */
const NUMBER_TOKEN = /-?\d[\d.,]*/;

export class NumberParser {
  /**
   * 텍스트에서 첫 번째 숫자 토큰 추출 (끝의 구분자 제거)
   * 예: "Price: ₹1,302." → "1,302"
   */
  static firstToken(text: string): string | null {
    const match = text.match(NUMBER_TOKEN);
    if (!match) {
      return null;
    }
    return match[0].replace(/[.,]+$/, "");
  }

  /**
   * 소수 파싱
   *
   * 구분자 판정 규칙:
   * - 쉼표와 점이 모두 있으면 뒤에 오는 쪽이 소수점
   * - 쉼표 1개 + 뒤 숫자 3자리 → 천 단위 구분, 그 외 → 소수점
   * - 쉼표 여러 개 → 모두 그룹 구분
   * - 점 1개 → 소수점, 여러 개 → 그룹 구분
   *
   * @returns 파싱 실패 시 null
   */
  static parseDecimal(text: string): number | null {
    const token = NumberParser.firstToken(text);
    if (token === null) {
      return null;
    }

    const negative = token.startsWith("-");
    const body = negative ? token.slice(1) : token;
    const commaCount = (body.match(/,/g) ?? []).length;
    const dotCount = (body.match(/\./g) ?? []).length;

    let normalized: string;
    if (commaCount > 0 && dotCount > 0) {
      const decimalMark = body.lastIndexOf(",") > body.lastIndexOf(".") ? "," : ".";
      const groupMark = decimalMark === "," ? "." : ",";
      normalized = body.split(groupMark).join("").replace(decimalMark, ".");
    } else if (commaCount === 1) {
      const digitsAfter = body.length - body.indexOf(",") - 1;
      normalized =
        digitsAfter === 3 ? body.replace(",", "") : body.replace(",", ".");
    } else if (commaCount > 1) {
      normalized = body.split(",").join("");
    } else if (dotCount > 1) {
      normalized = body.split(".").join("");
    } else {
      normalized = body;
    }

    const value = Number.parseFloat(normalized);
    if (!Number.isFinite(value)) {
      return null;
    }
    return negative ? -value : value;
  }

  /**
   * 정수 파싱
   *
   * 첫 번째 숫자 구간(쉼표/공백 자릿수 구분 허용)만 사용, 소수점 이하는 버림
   * 예: "7,624 ratings" → 7624, "3,34,015" → 334015, "7 624" → 7624, "12.5" → 12
   */
  static parseInteger(text: string): number | null {
    const match = text.match(/\d+(?:[,\s]\d{2,3}(?!\d))*/);
    if (!match) {
      return null;
    }
    const value = Number.parseInt(match[0].replace(/[,\s]/g, ""), 10);
    return Number.isSafeInteger(value) ? value : null;
  }

  /**
   * 통화 기호가 붙은 금액 토큰 목록
   * 예: "₹592 ₹1,302 54% off" → ["592", "1,302"]
   */
  static extractCurrencyAmounts(text: string): string[] {
    const regex = /(?:₹|\brs\.?|\binr|\$|€|£)\s*(\d[\d,]*(?:\.\d{1,2})?)/gi;
    const amounts: string[] = [];
    for (const match of text.matchAll(regex)) {
      amounts.push(match[1]);
    }
    return amounts;
  }
}
