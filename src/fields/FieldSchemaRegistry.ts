/**
 * Field Schema Registry
 *
 * 사전 정의 필드(fields.yaml)와 임의의 커스텀 필드명을 FieldSpec으로 해석
 * - 프로세스 시작 시 1회 구성, 이후 읽기 전용 (동기화 불필요)
 * - resolve()는 절대 실패하지 않음: 모르는 이름은 커스텀 스펙으로 합성
 *
 * SOLID 원칙:
 * - SRP: 필드명 → FieldSpec 해석만 담당
 * - OCP: 새 사전 정의 필드는 YAML 추가로 확장
 */

import {
  FieldConfigLoader,
  type FieldDefinition,
  type FieldsFile,
} from "@/config/FieldConfigLoader";
import type {
  CustomFieldSpec,
  FieldSpec,
  PredefinedFieldSpec,
} from "@/core/domain/FieldSpec";

/**
 * 이름 비교용 정규화 (대소문자, 공백/밑줄/하이픈 차이 무시)
 */
export function normalizeFieldName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_-]+/g, "_");
}

/**
 * 커스텀 필드 라벨 (밑줄/점 → 공백)
 */
export function toFieldLabel(name: string): string {
  const label = name.replace(/[_.]+/g, " ").replace(/\s+/g, " ").trim();
  return label.length > 0 ? label : name;
}

function buildCustomRules(label: string): string[] {
  const compact = label.replace(/\s+/g, "");
  const words = label.split(" ");
  const rules = [
    `Search the entire text for '${label}' and for '${compact}' (OCR may join or split words).`,
  ];
  if (words.length > 1) {
    rules.push(
      `The words ${words.map((w) => `'${w}'`).join(" and ")} may also appear separately but next to each other.`,
    );
  }
  rules.push(
    `Accepted layouts: '${label}: VALUE', '${label} VALUE', '${label} - VALUE', or '${label}' on one line with the values on the following lines.`,
    `Read line by line from the label and capture ALL content until the next field label, title or section header (e.g. 'Delivery Option', 'Brand', 'ADD TO BAG').`,
    "For selectors such as sizes or variants, capture every option listed (e.g. 'S M L XL XXL').",
    "Never truncate long values. If the label is immediately followed by another section, return null.",
  );
  return rules;
}

export class FieldSchemaRegistry {
  private readonly definitions: ReadonlyMap<string, FieldDefinition>;
  private readonly lookup: ReadonlyMap<string, string>;
  readonly defaultFieldNames: readonly string[];

  constructor(config: FieldsFile) {
    const definitions = new Map<string, FieldDefinition>();
    const lookup = new Map<string, string>();

    for (const [key, definition] of Object.entries(config.fields)) {
      definitions.set(key, definition);
      lookup.set(normalizeFieldName(key), key);
    }
    // 별칭은 정식 키를 덮어쓰지 않음
    for (const [key, definition] of Object.entries(config.fields)) {
      for (const alias of definition.aliases) {
        const normalized = normalizeFieldName(alias);
        if (!lookup.has(normalized)) {
          lookup.set(normalized, key);
        }
      }
    }

    this.definitions = definitions;
    this.lookup = lookup;
    this.defaultFieldNames = Object.freeze([...config.defaults]);
  }

  /**
   * fields.yaml 기반 레지스트리 생성
   */
  static fromConfig(
    loader: FieldConfigLoader = FieldConfigLoader.getInstance(),
  ): FieldSchemaRegistry {
    return new FieldSchemaRegistry(loader.load());
  }

  /**
   * 필드명 해석
   * 결과 스펙의 name은 요청된 문자열 그대로 (결과 키로 사용)
   */
  resolve(name: string): FieldSpec {
    const key = this.lookup.get(normalizeFieldName(name));
    const definition = key === undefined ? undefined : this.definitions.get(key);
    if (key !== undefined && definition) {
      return this.toPredefined(name, key, definition);
    }
    return this.synthesizeCustom(name);
  }

  /**
   * 요청 필드 목록 해석
   * - 비어 있거나 없으면 기본 필드
   * - 공백 이름 제외, 동일 이름은 첫 번째만 유지 (요청 순서 보존)
   */
  resolveAll(names?: readonly string[]): FieldSpec[] {
    const requested = (names ?? []).filter((n) => n.trim().length > 0);
    const effective = requested.length > 0 ? requested : this.defaultFieldNames;

    const seen = new Set<string>();
    const specs: FieldSpec[] = [];
    for (const name of effective) {
      if (seen.has(name)) continue;
      seen.add(name);
      specs.push(this.resolve(name));
    }
    return specs;
  }

  /**
   * 사전 정의 필드 목록 (키 이름 기준)
   */
  listPredefined(): PredefinedFieldSpec[] {
    return [...this.definitions.entries()].map(([key, definition]) =>
      this.toPredefined(key, key, definition),
    );
  }

  /**
   * 별칭 목록 (필드 조회 API용)
   */
  aliasesOf(key: string): readonly string[] {
    return this.definitions.get(key)?.aliases ?? [];
  }

  private toPredefined(
    name: string,
    key: string,
    definition: FieldDefinition,
  ): PredefinedFieldSpec {
    const spec: PredefinedFieldSpec = {
      kind: "predefined",
      name,
      key,
      valueType: definition.type,
      extractionRules: Object.freeze([...definition.rules]),
      example:
        definition.example === undefined || definition.example === null
          ? null
          : String(definition.example),
      description: definition.description,
      range: definition.range ?? null,
      role: definition.role ?? null,
    };
    return Object.freeze(spec);
  }

  private synthesizeCustom(name: string): CustomFieldSpec {
    const label = toFieldLabel(name);
    const spec: CustomFieldSpec = {
      kind: "custom",
      name,
      label,
      valueType: "string",
      extractionRules: Object.freeze(buildCustomRules(label)),
      example: null,
      description: `Custom field "${label}"`,
    };
    return Object.freeze(spec);
  }
}

let registryInstance: FieldSchemaRegistry | null = null;

/**
 * 프로세스 전역 레지스트리 (최초 호출 시 구성)
 */
export function getFieldSchemaRegistry(): FieldSchemaRegistry {
  if (!registryInstance) {
    registryInstance = FieldSchemaRegistry.fromConfig();
  }
  return registryInstance;
}
