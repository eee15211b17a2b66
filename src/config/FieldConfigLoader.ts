/**
 * 사전 정의 필드 YAML 로더
 * Singleton Pattern 적용
 *
 * SOLID 원칙:
 * - SRP: fields.yaml 로드 및 스키마 검증만 담당
 * - OCP: 새 사전 정의 필드는 YAML 추가만으로 확장
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";

const DEFAULT_FIELDS_PATH = path.resolve(
  __dirname,
  "..",
  "..",
  "config",
  "fields.yaml",
);

const FieldDefinitionSchema = z
  .object({
    description: z.string().min(1),
    type: z.enum(["decimal", "integer", "string"]),
    example: z.union([z.string(), z.number()]).nullable().optional(),
    range: z
      .object({ min: z.number(), max: z.number() })
      .refine((r) => r.min <= r.max, "range.min must be <= range.max")
      .optional(),
    role: z.enum(["currentPrice", "referencePrice"]).optional(),
    aliases: z.array(z.string().min(1)).default([]),
    rules: z.array(z.string().min(1)).min(1),
  })
  .refine((def) => def.role === undefined || def.type === "decimal", {
    message: "price role requires decimal type",
  });

const FieldsFileSchema = z.object({
  defaults: z.array(z.string().min(1)).min(1),
  fields: z.record(z.string().min(1), FieldDefinitionSchema),
});

export type FieldDefinition = z.infer<typeof FieldDefinitionSchema>;
export type FieldsFile = z.infer<typeof FieldsFileSchema>;

/**
 * Field Config Loader Singleton
 */
export class FieldConfigLoader {
  private static instance: FieldConfigLoader;
  private cache: Map<string, FieldsFile> = new Map();

  private constructor() {}

  static getInstance(): FieldConfigLoader {
    if (!FieldConfigLoader.instance) {
      FieldConfigLoader.instance = new FieldConfigLoader();
    }
    return FieldConfigLoader.instance;
  }

  /**
   * fields.yaml 로드 (검증 + 캐시)
   * @param filePath - 기본값: 저장소 루트의 config/fields.yaml
   */
  load(filePath: string = DEFAULT_FIELDS_PATH): FieldsFile {
    const cached = this.cache.get(filePath);
    if (cached) {
      return cached;
    }

    if (!fs.existsSync(filePath)) {
      throw new Error(`Field config not found: ${filePath}`);
    }

    const parsed = FieldConfigLoader.parse(fs.readFileSync(filePath, "utf8"));
    this.cache.set(filePath, parsed);
    return parsed;
  }

  /**
   * YAML 문자열 파싱 및 검증
   */
  static parse(content: string): FieldsFile {
    const result = FieldsFileSchema.safeParse(yaml.load(content));
    if (!result.success) {
      const detail = result.error.errors
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join(", ");
      throw new Error(`Invalid field config: ${detail}`);
    }

    const unknownDefaults = result.data.defaults.filter(
      (name) => !(name in result.data.fields),
    );
    if (unknownDefaults.length > 0) {
      throw new Error(
        `Default fields not defined: ${unknownDefaults.join(", ")}`,
      );
    }

    return result.data;
  }

  /**
   * 캐시 클리어 (테스트용)
   */
  clearCache(): void {
    this.cache.clear();
  }
}
