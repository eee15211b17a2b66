/**
 * Extract API Router
 *
 * - POST / - 단일 URL 또는 URL 목록 추출
 * - POST /batch - URL 목록 추출
 * - POST /upload-csv - CSV 업로드 (url/link 컬럼 또는 첫 컬럼)
 *
 * 클라이언트 연결이 끊기면 AbortSignal로 진행 중인 추출 취소
 */

import {
  Router,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import multer from "multer";
import { z } from "zod";
import { BATCH_CONFIG, SERVER_CONFIG } from "@/config/constants";
import { getRequestLogger, getRequestSignal } from "@/middleware/requestLogger";
import { sendError } from "@/middleware/errorHandler";
import {
  summarize,
  type BatchExtractionOptions,
  type BatchExtractionService,
  type SingleExtractor,
} from "@/services/BatchExtractionService";
import { isValidUrl, readUrlsFromCsv } from "@/utils/CsvUrlReader";
import { errorMessage } from "@/utils/async";

export interface ExtractRouterDeps {
  extractor: SingleExtractor;
  batch: Pick<BatchExtractionService, "extractMany">;
}

// ============================================
// 요청 스키마
// ============================================

const HttpUrlSchema = z
  .string()
  .trim()
  .refine(isValidUrl, { message: "must be an absolute http(s) URL" });

const ExtractOptionsSchema = z.object({
  fields: z.array(z.string()).max(50).optional(),
  preferDomText: z.boolean().optional(),
  allowOcrFallback: z.boolean().optional(),
  debug: z.boolean().optional(),
  concurrency: z.number().int().min(1).optional(),
});

const UrlListSchema = z
  .array(HttpUrlSchema)
  .min(1, "urls must not be empty")
  .max(BATCH_CONFIG.MAX_URLS, `at most ${BATCH_CONFIG.MAX_URLS} urls per request`);

export const ExtractRequestSchema = ExtractOptionsSchema.extend({
  url: HttpUrlSchema.optional(),
  urls: UrlListSchema.optional(),
}).refine((body) => (body.url === undefined) !== (body.urls === undefined), {
  message: "Provide exactly one of url or urls",
});

export const BatchRequestSchema = ExtractOptionsSchema.extend({
  urls: UrlListSchema,
});

const BooleanFormSchema = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

/** multipart 폼 값은 모두 문자열 */
export const CsvFormSchema = z.object({
  fields: z
    .string()
    .optional()
    .transform((value) =>
      value === undefined
        ? undefined
        : value
            .split(",")
            .map((name) => name.trim())
            .filter((name) => name.length > 0),
    ),
  preferDomText: BooleanFormSchema.optional(),
  allowOcrFallback: BooleanFormSchema.optional(),
  debug: BooleanFormSchema.optional(),
  concurrency: z.coerce.number().int().min(1).optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message))
    .join(", ");
}

function toOptions(body: z.infer<typeof ExtractOptionsSchema>): BatchExtractionOptions {
  return {
    fields: body.fields,
    preferDomText: body.preferDomText,
    allowOcrFallback: body.allowOcrFallback,
    debug: body.debug,
  };
}

export function createExtractRouter(deps: ExtractRouterDeps): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: SERVER_CONFIG.MAX_UPLOAD_BYTES, files: 1 },
  });

  const runBatch = async (
    req: Request,
    res: Response,
    urls: string[],
    options: BatchExtractionOptions,
    concurrency: number | undefined,
  ): Promise<void> => {
    const results = await deps.batch.extractMany(
      urls,
      options,
      concurrency,
      getRequestSignal(req),
    );
    const summary = summarize(results);
    getRequestLogger(req).info(summary, "[ExtractRouter] 배치 추출 응답");
    res.json({ success: true, data: { results, summary } });
  };

  /**
   * POST /api/v1/extract
   *
   * Body:
   * {
   *   "url": "https://shop.example/p/123",
   *   "fields": ["rating", "price", "mrp"],
   *   "preferDomText": true,
   *   "allowOcrFallback": true
   * }
   *
   * Response (url):
   * { "success": true, "data": { "values": {...}, "source": "dom", "warnings": [], "error": null } }
   *
   * Response (urls):
   * { "success": true, "data": { "results": [...], "summary": {...} } }
   */
  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = ExtractRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, 400, "VALIDATION_ERROR", formatIssues(parsed.error));
      return;
    }

    try {
      const body = parsed.data;
      if (body.urls !== undefined) {
        await runBatch(req, res, body.urls, toOptions(body), body.concurrency);
        return;
      }
      if (body.url === undefined) {
        sendError(res, 400, "VALIDATION_ERROR", "url is required");
        return;
      }

      const result = await deps.extractor.extract(
        { ...toOptions(body), url: body.url },
        getRequestSignal(req),
      );
      res.json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/v1/extract/batch
   *
   * Body: { "urls": [...], "fields": [...], "concurrency": 3 }
   */
  router.post(
    "/batch",
    async (req: Request, res: Response, next: NextFunction) => {
      const parsed = BatchRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        sendError(res, 400, "VALIDATION_ERROR", formatIssues(parsed.error));
        return;
      }

      try {
        const body = parsed.data;
        await runBatch(req, res, body.urls, toOptions(body), body.concurrency);
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * POST /api/v1/extract/upload-csv
   *
   * multipart/form-data:
   * - file: CSV (url/link 컬럼 또는 첫 번째 컬럼)
   * - fields: "rating,price" (선택)
   */
  router.post(
    "/upload-csv",
    upload.single("file"),
    async (req: Request, res: Response, next: NextFunction) => {
      if (!req.file) {
        sendError(res, 400, "VALIDATION_ERROR", "CSV file is required (field: file)");
        return;
      }

      const form = CsvFormSchema.safeParse(req.body ?? {});
      if (!form.success) {
        sendError(res, 400, "VALIDATION_ERROR", formatIssues(form.error));
        return;
      }

      let urls: string[];
      try {
        const read = readUrlsFromCsv(req.file.buffer.toString("utf-8"));
        urls = read.urls;
        getRequestLogger(req).info(
          { url_count: read.urls.length, skipped: read.skipped },
          "[ExtractRouter] CSV URL 로드",
        );
      } catch (error) {
        sendError(res, 400, "VALIDATION_ERROR", errorMessage(error));
        return;
      }

      if (urls.length === 0) {
        sendError(res, 400, "VALIDATION_ERROR", "CSV contains no valid http(s) URLs");
        return;
      }
      if (urls.length > BATCH_CONFIG.MAX_URLS) {
        sendError(
          res,
          400,
          "VALIDATION_ERROR",
          `CSV contains ${urls.length} URLs; at most ${BATCH_CONFIG.MAX_URLS} are allowed`,
        );
        return;
      }

      try {
        const { concurrency, ...options } = form.data;
        await runBatch(req, res, urls, options, concurrency);
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
