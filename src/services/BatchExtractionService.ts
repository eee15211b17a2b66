/**
 * Batch Extraction Service
 *
 * 여러 URL을 제한된 동시성으로 추출
 * - URL마다 독립 요청 (상태 공유 없음)
 * - 한 URL의 실패가 다른 URL에 영향 없음 (실패도 envelope으로 반환)
 * - 결과는 입력 순서대로 정렬
 */

import type { Logger } from "@/config/logger";
import { logger as rootLogger } from "@/config/logger";
import { BATCH_CONFIG } from "@/config/constants";
import type {
  ExtractionInput,
  ExtractionResult,
  UrlExtractionResult,
} from "@/core/domain/Extraction";
import { errorMessage } from "@/utils/async";

export type BatchExtractionOptions = Omit<ExtractionInput, "url">;

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
}

/** 오케스트레이터 중 배치가 사용하는 부분 */
export interface SingleExtractor {
  extract(input: ExtractionInput, signal?: AbortSignal): Promise<ExtractionResult>;
}

export interface BatchLimits {
  maxConcurrency: number;
  defaultConcurrency: number;
}

/**
 * 요청 동시성 해석: [1, max] 범위로 제한
 */
export function resolveConcurrency(
  requested: number | undefined,
  limits: BatchLimits = {
    maxConcurrency: BATCH_CONFIG.MAX_CONCURRENCY,
    defaultConcurrency: BATCH_CONFIG.DEFAULT_CONCURRENCY,
  },
): number {
  const value =
    requested !== undefined && Number.isFinite(requested)
      ? Math.floor(requested)
      : limits.defaultConcurrency;
  return Math.min(Math.max(value, 1), limits.maxConcurrency);
}

export function summarize(results: readonly UrlExtractionResult[]): BatchSummary {
  const failed = results.filter((r) => r.error !== null).length;
  return { total: results.length, succeeded: results.length - failed, failed };
}

export class BatchExtractionService {
  private readonly logger: Logger;
  private readonly limits: BatchLimits | undefined;

  constructor(
    private readonly extractor: SingleExtractor,
    options: { logger?: Logger; limits?: BatchLimits } = {},
  ) {
    this.logger = options.logger ?? rootLogger;
    this.limits = options.limits;
  }

  async extractMany(
    urls: readonly string[],
    options: BatchExtractionOptions = {},
    concurrency?: number,
    signal?: AbortSignal,
  ): Promise<UrlExtractionResult[]> {
    const workerCount = Math.min(
      resolveConcurrency(concurrency, this.limits),
      Math.max(urls.length, 1),
    );
    const results = new Array<UrlExtractionResult>(urls.length);
    let cursor = 0;

    this.logger.info(
      { url_count: urls.length, concurrency: workerCount },
      "[Batch] 배치 추출 시작",
    );

    const worker = async (): Promise<void> => {
      while (cursor < urls.length) {
        const index = cursor++;
        results[index] = await this.extractOne(urls[index], options, signal);
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const summary = summarize(results);
    this.logger.info(summary, "[Batch] 배치 추출 완료");
    return results;
  }

  private async extractOne(
    url: string,
    options: BatchExtractionOptions,
    signal?: AbortSignal,
  ): Promise<UrlExtractionResult> {
    try {
      const result = await this.extractor.extract({ ...options, url }, signal);
      return { url, ...result };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ url, error: message }, "[Batch] URL 추출 실패");
      return {
        url,
        values: {},
        source: options.preferDomText === false ? "ocr" : "dom",
        warnings: [],
        error: message,
      };
    }
  }
}
