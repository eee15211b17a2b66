/**
 * Extraction Orchestrator
 *
 * 요청 1건의 전체 흐름을 소유
 *   필드 해석 → 텍스트 획득 → 프롬프트 생성 → 추론 체인 → 결과 파싱/검증
 *
 * SOLID 원칙:
 * - SRP: 단계 조율만 담당 (각 단계 로직은 협력 객체에 위임)
 * - DIP: 협력 객체는 생성자 주입 (테스트에서 fake로 교체)
 *
 * 취소는 단계 경계에서만 확인하며, 취소된 요청은 부분 결과 대신 에러 envelope 반환
 */

import { v4 as uuidv4 } from "uuid";
import type { Logger } from "@/config/logger";
import { logger as rootLogger } from "@/config/logger";
import type { AcquisitionOutcome } from "@/core/domain/AcquiredText";
import type {
  ExtractionDiagnostics,
  ExtractionInput,
  ExtractionRequest,
  ExtractionResult,
} from "@/core/domain/Extraction";
import type { InferenceAttempt } from "@/core/domain/InferenceAttempt";
import {
  AcquisitionError,
  CancelledError,
  InferenceUnavailableError,
} from "@/core/errors/ExtractionErrors";
import { formatWarning } from "@/core/errors/warnings";
import type { TextAcquisitionStrategy } from "@/acquisition/TextAcquisitionStrategy";
import type { FieldSchemaRegistry } from "@/fields/FieldSchemaRegistry";
import type { InferenceChain } from "@/llm/InferenceChain";
import { buildExtractionPrompt } from "@/llm/prompts/extractionPrompt";
import { ResultParser, type ParsedExtraction } from "@/parsing/ResultParser";
import { createJobLogger, logImportant } from "@/utils/LoggerContext";
import { errorMessage } from "@/utils/async";

export interface OrchestratorDeps {
  registry: FieldSchemaRegistry;
  acquisition: TextAcquisitionStrategy;
  inference: InferenceChain;
  parser?: ResultParser;
  logger?: Logger;
}

export class ExtractionOrchestrator {
  private readonly parser: ResultParser;
  private readonly logger: Logger;

  constructor(private readonly deps: OrchestratorDeps) {
    this.parser = deps.parser ?? new ResultParser();
    this.logger = deps.logger ?? rootLogger;
  }

  /**
   * 입력 → 불변 요청
   * 필드 미지정 시 기본 필드, 플래그 기본값은 모두 true
   * debug 요청에서 빈 필드 목록([])을 명시하면 필드 없이 탐색 모드로 추론
   */
  buildRequest(input: ExtractionInput): ExtractionRequest {
    const debug = input.debug ?? false;
    const discover = debug && input.fields !== undefined && input.fields.length === 0;
    return Object.freeze({
      url: input.url,
      fields: Object.freeze(
        discover ? [] : this.deps.registry.resolveAll(input.fields),
      ),
      preferDomText: input.preferDomText ?? true,
      allowOcrFallback: input.allowOcrFallback ?? true,
      debug,
    });
  }

  /**
   * 추출 실행
   *
   * 예외를 던지지 않고 항상 envelope 반환
   * - 텍스트 획득 실패: values={}, error=사유
   * - 모든 추론 실패: 경고 추가 후 패턴 추출만으로 진행
   * - 취소: values={}, error="Request cancelled"
   */
  async extract(
    input: ExtractionInput,
    signal?: AbortSignal,
  ): Promise<ExtractionResult> {
    const request = this.buildRequest(input);
    const log = createJobLogger(uuidv4(), request.url, this.logger);
    const startedAt = Date.now();

    log.info(
      {
        fields: request.fields.map((f) => f.name),
        prefer_dom: request.preferDomText,
        allow_ocr: request.allowOcrFallback,
      },
      "[Orchestrator] 추출 시작",
    );

    try {
      this.checkpoint(signal);

      // 1. 텍스트 획득
      let acquisition: AcquisitionOutcome;
      try {
        acquisition = await this.deps.acquisition.acquire(request, signal);
      } catch (error) {
        if (error instanceof AcquisitionError) {
          log.warn(
            { reasons: error.reasons },
            "[Orchestrator] 텍스트 획득 실패",
          );
          return this.failure(request, error.message);
        }
        throw error;
      }
      this.checkpoint(signal);

      // 2. 프롬프트 + 추론
      const prompt = buildExtractionPrompt(request.fields, acquisition.primary);
      const attempts = await this.deps.inference.invoke(prompt, signal);
      this.checkpoint(signal);

      // 3. 파싱/검증
      const parsed = this.parser.parse(attempts, request.fields, acquisition);
      const warnings = [
        ...this.acquisitionWarnings(request, acquisition),
        ...this.inferenceWarnings(attempts, log),
        ...parsed.result.warnings,
      ];

      const result: ExtractionResult = {
        ...parsed.result,
        warnings: Object.freeze(warnings),
        ...(request.debug
          ? { diagnostics: this.diagnostics(acquisition, attempts, parsed) }
          : {}),
      };

      logImportant(log, "[Orchestrator] 추출 완료", {
        source: result.source,
        warnings: warnings.length,
        filled: Object.values(result.values).filter((v) => v !== null).length,
        duration_ms: Date.now() - startedAt,
      });
      return Object.freeze(result);
    } catch (error) {
      if (error instanceof CancelledError) {
        log.info("[Orchestrator] 요청 취소됨");
        return this.failure(request, error.message);
      }
      log.error({ error: errorMessage(error) }, "[Orchestrator] 예기치 않은 오류");
      return this.failure(request, errorMessage(error));
    }
  }

  private checkpoint(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new CancelledError();
    }
  }

  private failure(request: ExtractionRequest, message: string): ExtractionResult {
    const result: ExtractionResult = {
      values: {},
      source: request.preferDomText ? "dom" : "ocr",
      warnings: [],
      error: message,
    };
    return Object.freeze(result);
  }

  /**
   * DOM 우선 요청이 OCR 텍스트로 끝난 경우 알림
   */
  private acquisitionWarnings(
    request: ExtractionRequest,
    acquisition: AcquisitionOutcome,
  ): string[] {
    if (!request.preferDomText || acquisition.primary.origin !== "ocr") {
      return [];
    }
    return [
      formatWarning(
        "AcquisitionWarning",
        "DOM text was unavailable or below the quality threshold; OCR text was used",
      ),
    ];
  }

  private inferenceWarnings(
    attempts: readonly InferenceAttempt[],
    log: Logger,
  ): string[] {
    if (attempts.some((a) => a.succeeded)) {
      return [];
    }

    const unavailable = new InferenceUnavailableError(
      attempts.length === 0
        ? "No inference backend is configured; values come from pattern extraction only"
        : `All ${attempts.length} inference attempts failed; values come from pattern extraction only`,
      attempts.length,
    );
    log.warn(
      { attempts: unavailable.attemptCount },
      "[Orchestrator] 추론 불가, 패턴 추출로 대체",
    );
    return [formatWarning("InferenceUnavailableError", unavailable.message)];
  }

  private diagnostics(
    acquisition: AcquisitionOutcome,
    attempts: readonly InferenceAttempt[],
    parsed: ParsedExtraction,
  ): ExtractionDiagnostics {
    const { primary } = acquisition;
    return {
      text: {
        origin: primary.origin,
        length: primary.content.length,
        qualitySignal: primary.qualitySignal,
      },
      attempts: attempts.map((a) => ({
        backendTier: a.backendTier,
        succeeded: a.succeeded,
        retryCount: a.retryCount,
        elapsedMs: a.elapsedMs,
        error: a.error,
      })),
      decoded: parsed.decoded,
      provenance: parsed.provenance,
    };
  }
}
