/**
 * Text Acquisition Strategy
 *
 * DOM 텍스트와 스크린샷 OCR 텍스트 중 신뢰할 텍스트를 선택하는 상태 머신
 *
 *   Idle → TryDom → Done(dom)
 *            ↓ (비활성 / 임계값 미달 / 어댑터 실패)
 *          TryOcr → Done(ocr)
 *            ↓ (비활성 / 실패)
 *          Failed → AcquisitionError
 *
 * - 페이지 캡처는 요청당 최대 1회 (DOM/OCR 공유)
 * - OCR은 설정된 엔진을 순서대로 모두 실행하고 결과를 이어 붙임 (중복 제거/자르기 없음)
 * - 재시도 없음 (재시도는 어댑터 경계의 책임)
 */

import type { Logger } from "@/config/logger";
import { ACQUISITION_CONFIG } from "@/config/constants";
import type {
  AcquiredText,
  AcquisitionOutcome,
  TextOrigin,
} from "@/core/domain/AcquiredText";
import type { ExtractionRequest } from "@/core/domain/Extraction";
import {
  AcquisitionError,
  CancelledError,
} from "@/core/errors/ExtractionErrors";
import type { IDomTextAdapter } from "@/core/interfaces/IDomTextAdapter";
import type { IOcrEngine } from "@/core/interfaces/IOcrEngine";
import type { IPageCapturer, PageCapture } from "@/core/interfaces/IPageCapturer";
import { errorMessage, withTimeout } from "@/utils/async";

export type AcquisitionStatus = "Idle" | "TryDom" | "TryOcr" | "Done" | "Failed";

export interface AcquisitionThresholds {
  minDomQuality: number;
  minOcrQuality: number;
}

export interface AcquisitionTimeouts {
  captureMs: number;
  domMs: number;
  ocrMs: number;
}

export interface TextAcquisitionDeps {
  capturer: IPageCapturer;
  domAdapter: IDomTextAdapter;
  ocrEngines: readonly IOcrEngine[];
  logger: Logger;
  thresholds?: Partial<AcquisitionThresholds>;
  timeouts?: Partial<AcquisitionTimeouts>;
}

/**
 * 품질 신호: 공백 제외 문자 수
 */
export function measureQuality(content: string): number {
  return content.replace(/\s+/g, "").length;
}

function toAcquiredText(content: string, origin: TextOrigin): AcquiredText {
  return Object.freeze({
    content,
    origin,
    qualitySignal: measureQuality(content),
  });
}

export class TextAcquisitionStrategy {
  private readonly thresholds: AcquisitionThresholds;
  private readonly timeouts: AcquisitionTimeouts;

  constructor(private readonly deps: TextAcquisitionDeps) {
    this.thresholds = {
      minDomQuality: ACQUISITION_CONFIG.MIN_DOM_QUALITY,
      minOcrQuality: ACQUISITION_CONFIG.MIN_OCR_QUALITY,
      ...deps.thresholds,
    };
    this.timeouts = {
      captureMs: ACQUISITION_CONFIG.CAPTURE_TIMEOUT_MS,
      domMs: ACQUISITION_CONFIG.DOM_FETCH_TIMEOUT_MS,
      ocrMs: ACQUISITION_CONFIG.OCR_TIMEOUT_MS,
      ...deps.timeouts,
    };
  }

  /**
   * 텍스트 획득
   * @throws AcquisitionError - DOM/OCR 모두 비활성 또는 실패
   * @throws CancelledError - DOM → OCR 전환 시점에 취소된 경우
   */
  async acquire(
    request: ExtractionRequest,
    signal?: AbortSignal,
  ): Promise<AcquisitionOutcome> {
    const log = this.deps.logger;
    const reasons: string[] = [];
    const supplementary: AcquiredText[] = [];
    const capture = this.lazyCapture(request.url, reasons);
    let status: AcquisitionStatus = "Idle";

    if (request.preferDomText) {
      status = this.transition(status, "TryDom");
      const dom = await this.tryDom(request.url, capture, reasons);
      if (dom && dom.qualitySignal >= this.thresholds.minDomQuality) {
        this.transition(status, "Done");
        log.info(
          { origin: "dom", quality: dom.qualitySignal },
          "[Acquisition] DOM 텍스트 채택",
        );
        return { primary: dom, supplementary };
      }
      if (dom && dom.qualitySignal > 0) {
        reasons.push(
          `DOM text below threshold (${dom.qualitySignal} < ${this.thresholds.minDomQuality})`,
        );
        supplementary.push(dom);
      }
    }

    if (request.allowOcrFallback) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      status = this.transition(status, "TryOcr");
      const ocr = await this.tryOcr(capture, reasons);
      if (ocr) {
        this.transition(status, "Done");
        log.info(
          { origin: "ocr", quality: ocr.qualitySignal },
          "[Acquisition] OCR 텍스트 채택",
        );
        return { primary: ocr, supplementary };
      }
    }

    this.transition(status, "Failed");
    if (!request.preferDomText && !request.allowOcrFallback) {
      reasons.push("DOM and OCR acquisition are both disabled");
    }
    log.warn({ reasons }, "[Acquisition] 사용 가능한 텍스트 없음");
    throw new AcquisitionError(
      `No usable text acquired: ${reasons.join("; ")}`,
      reasons,
    );
  }

  private transition(
    from: AcquisitionStatus,
    to: AcquisitionStatus,
  ): AcquisitionStatus {
    this.deps.logger.debug({ from, to }, "[Acquisition] 상태 전이");
    return to;
  }

  /**
   * 캡처는 처음 필요할 때 1회만 실행, 실패 시 null
   */
  private lazyCapture(
    url: string,
    reasons: string[],
  ): () => Promise<PageCapture | null> {
    let pending: Promise<PageCapture | null> | null = null;
    return () => {
      if (!pending) {
        pending = withTimeout(
          this.deps.capturer.capture(url),
          this.timeouts.captureMs,
          "Page capture",
        ).catch((error: unknown) => {
          const message = errorMessage(error);
          reasons.push(`Page capture failed: ${message}`);
          this.deps.logger.warn(
            { error: message },
            "[Acquisition] 페이지 캡처 실패",
          );
          return null;
        });
      }
      return pending;
    };
  }

  private async tryDom(
    url: string,
    capture: () => Promise<PageCapture | null>,
    reasons: string[],
  ): Promise<AcquiredText | null> {
    const captured = await capture();
    try {
      const content = await withTimeout(
        this.deps.domAdapter.extractText({
          url,
          renderedMarkup: captured?.renderedMarkup ?? null,
        }),
        this.timeouts.domMs,
        "DOM text extraction",
      );
      return toAcquiredText(content, "dom");
    } catch (error) {
      const message = errorMessage(error);
      reasons.push(`DOM extraction failed: ${message}`);
      this.deps.logger.warn({ error: message }, "[Acquisition] DOM 추출 실패");
      return null;
    }
  }

  private async tryOcr(
    capture: () => Promise<PageCapture | null>,
    reasons: string[],
  ): Promise<AcquiredText | null> {
    if (this.deps.ocrEngines.length === 0) {
      reasons.push("No OCR engine configured");
      return null;
    }

    const captured = await capture();
    if (!captured) {
      reasons.push("Screenshot unavailable for OCR");
      return null;
    }

    const outputs: string[] = [];
    for (const engine of this.deps.ocrEngines) {
      try {
        const text = await withTimeout(
          engine.extractText(captured.image),
          this.timeouts.ocrMs,
          `OCR (${engine.name})`,
        );
        outputs.push(text);
        this.deps.logger.debug(
          { engine: engine.name, length: text.length },
          "[Acquisition] OCR 엔진 완료",
        );
      } catch (error) {
        const message = errorMessage(error);
        reasons.push(`OCR engine ${engine.name} failed: ${message}`);
        this.deps.logger.warn(
          { engine: engine.name, error: message },
          "[Acquisition] OCR 엔진 실패, 다음 엔진 진행",
        );
      }
    }

    if (outputs.length === 0) {
      return null;
    }

    const ocr = toAcquiredText(outputs.join("\n"), "ocr");
    if (ocr.qualitySignal < this.thresholds.minOcrQuality) {
      reasons.push(
        `Insufficient text extracted (${ocr.qualitySignal} < ${this.thresholds.minOcrQuality})`,
      );
      return null;
    }
    return ocr;
  }
}
