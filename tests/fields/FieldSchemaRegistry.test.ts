/**
 * FieldSchemaRegistry 테스트
 *
 * 필드명 → FieldSpec 해석 (사전 정의/별칭/커스텀/기본 필드)
 */

import { describe, it, expect } from "@jest/globals";
import {
  FieldSchemaRegistry,
  normalizeFieldName,
  toFieldLabel,
} from "@/fields/FieldSchemaRegistry";
import { testRegistry } from "../helpers/fakes";

describe("FieldSchemaRegistry", () => {
  const registry = testRegistry();

  describe("resolveAll - 요청 필드 목록 해석", () => {
    it("필드가 없으면 기본 필드(rating, review)를 사용해야 함", () => {
      expect(registry.resolveAll().map((f) => f.name)).toEqual([
        "rating",
        "review",
      ]);
      expect(registry.resolveAll([]).map((f) => f.name)).toEqual([
        "rating",
        "review",
      ]);
    });

    it("빈 이름은 건너뛰고 중복은 첫 번째만 유지해야 함", () => {
      const specs = registry.resolveAll(["price", " ", "price", "Rating"]);

      expect(specs.map((f) => f.name)).toEqual(["price", "Rating"]);
    });

    it("요청 순서를 유지해야 함", () => {
      const specs = registry.resolveAll(["mrp", "Operating System", "rating"]);

      expect(specs.map((f) => f.name)).toEqual([
        "mrp",
        "Operating System",
        "rating",
      ]);
    });
  });

  describe("resolve - 단일 필드 해석", () => {
    it("사전 정의 필드는 타입/범위/규칙을 가져야 함", () => {
      const spec = registry.resolve("rating");

      expect(spec.kind).toBe("predefined");
      expect(spec.valueType).toBe("decimal");
      if (spec.kind === "predefined") {
        expect(spec.key).toBe("rating");
        expect(spec.range).toEqual({ min: 0, max: 5 });
      }
      expect(spec.extractionRules.length).toBeGreaterThan(0);
    });

    it("별칭은 대소문자/공백과 무관하게 사전 정의 키로 해석해야 함", () => {
      const mrp = registry.resolve("M.R.P.");
      const price = registry.resolve("Selling Price");

      expect(mrp.kind === "predefined" && mrp.key).toBe("mrp");
      expect(price.kind === "predefined" && price.key).toBe("price");
    });

    it("결과 스펙의 name은 요청된 문자열 그대로여야 함", () => {
      expect(registry.resolve("Selling Price").name).toBe("Selling Price");
    });

    it("알 수 없는 이름은 문자열 타입 커스텀 필드로 합성해야 함", () => {
      const spec = registry.resolve("Operating System");

      expect(spec.kind).toBe("custom");
      expect(spec.valueType).toBe("string");
      expect(spec.example).toBeNull();
      expect(spec.extractionRules[0]).toBe(
        "Search the entire text for 'Operating System' and for 'OperatingSystem' (OCR may join or split words).",
      );
    });

    it("커스텀 필드 라벨은 밑줄을 공백으로 바꿔야 함", () => {
      const spec = registry.resolve("operating_system");

      expect(spec.kind === "custom" && spec.label).toBe("operating system");
    });

    it("해석된 스펙은 불변이어야 함", () => {
      expect(Object.isFrozen(registry.resolve("price"))).toBe(true);
      expect(Object.isFrozen(registry.resolve("Warranty"))).toBe(true);
    });
  });

  describe("listPredefined", () => {
    it("YAML에 정의된 순서로 모든 사전 정의 필드를 반환해야 함", () => {
      expect(registry.listPredefined().map((f) => f.key)).toEqual([
        "rating",
        "ratings_count",
        "reviews_count",
        "review",
        "price",
        "mrp",
        "product_name",
        "discount",
        "availability",
      ]);
    });

    it("가격 필드는 교차 검증 역할을 가져야 함", () => {
      const byKey = new Map(registry.listPredefined().map((f) => [f.key, f]));

      expect(byKey.get("price")?.role).toBe("currentPrice");
      expect(byKey.get("mrp")?.role).toBe("referencePrice");
    });
  });

  it("별칭은 다른 필드의 정식 키를 덮어쓰지 않아야 함", () => {
    const custom = new FieldSchemaRegistry({
      defaults: ["alpha"],
      fields: {
        alpha: {
          description: "Alpha",
          type: "string",
          aliases: ["beta"],
          rules: ["Find alpha"],
        },
        beta: {
          description: "Beta",
          type: "string",
          aliases: [],
          rules: ["Find beta"],
        },
      },
    });

    const spec = custom.resolve("beta");
    expect(spec.kind === "predefined" && spec.key).toBe("beta");
  });
});

describe("normalizeFieldName / toFieldLabel", () => {
  it("공백/밑줄/하이픈을 같은 이름으로 취급해야 함", () => {
    expect(normalizeFieldName(" Star-Rating ")).toBe("star_rating");
    expect(normalizeFieldName("star rating")).toBe("star_rating");
  });

  it("라벨에서 밑줄과 점을 공백으로 바꿔야 함", () => {
    expect(toFieldLabel("screen.size_inches")).toBe("screen size inches");
  });
});
