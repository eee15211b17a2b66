/**
 * Fields API Router
 *
 * - GET / - 사전 정의 필드 목록 + 기본 필드
 */

import { Router, type Request, type Response } from "express";
import type { FieldSchemaRegistry } from "@/fields/FieldSchemaRegistry";

export function createFieldsRouter(registry: FieldSchemaRegistry): Router {
  const router = Router();

  /**
   * GET /api/v1/fields
   *
   * Response:
   * {
   *   "success": true,
   *   "data": {
   *     "defaults": ["rating", "review"],
   *     "fields": [{ "key": "rating", "type": "decimal", "aliases": [...] }]
   *   }
   * }
   */
  router.get("/", (_req: Request, res: Response) => {
    const fields = registry.listPredefined().map((spec) => ({
      key: spec.key,
      type: spec.valueType,
      description: spec.description,
      example: spec.example,
      range: spec.range,
      aliases: registry.aliasesOf(spec.key),
    }));

    res.json({
      success: true,
      data: { defaults: registry.defaultFieldNames, fields },
    });
  });

  return router;
}
