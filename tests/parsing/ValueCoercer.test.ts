/**
 * 필드 값 타입 변환 테스트
 */

import { describe, it, expect } from "@jest/globals";
import { coerceValue, withRangeCheck } from "@/parsing/ValueCoercer";
import { testRegistry } from "../helpers/fakes";

describe("coerceValue", () => {
  const registry = testRegistry();
  const rating = registry.resolve("rating");
  const ratingsCount = registry.resolve("ratings_count");
  const review = registry.resolve("review");
  const mrp = registry.resolve("mrp");

  it("decimal 필드는 문자열/숫자를 숫자로 변환해야 함", () => {
    expect(coerceValue("4.3", rating)).toEqual({ value: 4.3, warning: null });
    expect(coerceValue(4.3, rating)).toEqual({ value: 4.3, warning: null });
    expect(coerceValue("₹1,302", mrp)).toEqual({ value: 1302, warning: null });
  });

  it("범위를 벗어난 값은 유지하고 경고해야 함", () => {
    expect(coerceValue(45, rating)).toEqual({
      value: 45,
      warning:
        '[ValidationWarning] "rating" value 45 is outside the documented range [0, 5]',
    });
  });

  it("integer 필드는 구분자를 제거하고 소수점을 버려야 함", () => {
    expect(coerceValue("7,624", ratingsCount).value).toBe(7624);
    expect(coerceValue(12.7, ratingsCount).value).toBe(12);
    expect(coerceValue("12.5", ratingsCount).value).toBe(12);
  });

  it("숫자로 해석할 수 없으면 null이어야 함", () => {
    expect(coerceValue("not rated", rating).value).toBeNull();
    expect(coerceValue({ value: 4 }, rating).value).toBeNull();
  });

  it("string 필드는 trim하고 null 유사 값은 null로 바꿔야 함", () => {
    expect(coerceValue("  Great fit  ", review).value).toBe("Great fit");
    expect(coerceValue("N/A", review).value).toBeNull();
    expect(coerceValue("null", review).value).toBeNull();
  });

  it("배열은 쉼표로 이어 붙여야 함", () => {
    const sizes = registry.resolve("Size");

    expect(coerceValue(["S", "M", " L "], sizes).value).toBe("S, M, L");
  });

  it("커스텀 필드에 숫자가 오면 문자열로 바꿔야 함", () => {
    expect(coerceValue(2, registry.resolve("Warranty Years")).value).toBe("2");
  });

  it("null/undefined는 null이어야 함", () => {
    expect(coerceValue(null, rating)).toEqual({ value: null, warning: null });
    expect(coerceValue(undefined, review)).toEqual({ value: null, warning: null });
  });
});

describe("withRangeCheck", () => {
  it("범위가 없는 필드는 경고하지 않아야 함", () => {
    const price = testRegistry().resolve("price");

    expect(withRangeCheck(99999, price)).toEqual({ value: 99999, warning: null });
  });
});
