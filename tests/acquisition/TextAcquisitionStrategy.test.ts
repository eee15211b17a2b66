/**
 * TextAcquisitionStrategy 테스트
 *
 * DOM 우선 → OCR 대체 → 실패 상태 전이 검증
 */

import { describe, it, expect } from "@jest/globals";
import { TextAcquisitionStrategy } from "@/acquisition/TextAcquisitionStrategy";
import type { ExtractionRequest } from "@/core/domain/Extraction";
import { AcquisitionError, CancelledError } from "@/core/errors/ExtractionErrors";
import type { IOcrEngine } from "@/core/interfaces/IOcrEngine";
import {
  FakeCapturer,
  FakeDomAdapter,
  FakeOcrEngine,
  RICH_DOM_TEXT,
  SAMPLE_CAPTURE,
  silentLogger,
  testRegistry,
} from "../helpers/fakes";

const URL = "https://shop.example/p/123";

function request(overrides: Partial<ExtractionRequest> = {}): ExtractionRequest {
  return {
    url: URL,
    fields: testRegistry().resolveAll(["rating", "price"]),
    preferDomText: true,
    allowOcrFallback: true,
    debug: false,
    ...overrides,
  };
}

function strategy(
  capturer: FakeCapturer,
  domAdapter: FakeDomAdapter,
  ocrEngines: IOcrEngine[],
) {
  return new TextAcquisitionStrategy({
    capturer,
    domAdapter,
    ocrEngines,
    logger: silentLogger,
    thresholds: { minDomQuality: 50, minOcrQuality: 10 },
  });
}

async function acquisitionReasons(promise: Promise<unknown>): Promise<readonly string[]> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof AcquisitionError)) {
    throw new Error("expected AcquisitionError");
  }
  return error.reasons;
}

describe("TextAcquisitionStrategy", () => {
  it("DOM 텍스트가 충분하면 OCR 없이 DOM을 채택해야 함", async () => {
    const capturer = new FakeCapturer(SAMPLE_CAPTURE);
    const dom = new FakeDomAdapter(RICH_DOM_TEXT);
    const ocr = new FakeOcrEngine("tesseract", "unused");

    const outcome = await strategy(capturer, dom, [ocr]).acquire(request());

    expect(outcome.primary.origin).toBe("dom");
    expect(outcome.primary.content).toBe(RICH_DOM_TEXT);
    expect(outcome.supplementary).toEqual([]);
    expect(dom.sources).toEqual([
      { url: URL, renderedMarkup: SAMPLE_CAPTURE.renderedMarkup },
    ]);
    expect(capturer.calls).toBe(1);
    expect(ocr.calls).toBe(0);
  });

  it("DOM 텍스트가 임계값 미달이면 OCR을 사용하고 DOM은 보조 텍스트로 남겨야 함", async () => {
    const capturer = new FakeCapturer(SAMPLE_CAPTURE);
    const dom = new FakeDomAdapter("Price ₹592");
    const ocr = new FakeOcrEngine("tesseract", RICH_DOM_TEXT);

    const outcome = await strategy(capturer, dom, [ocr]).acquire(request());

    expect(outcome.primary.origin).toBe("ocr");
    expect(outcome.primary.content).toBe(RICH_DOM_TEXT);
    expect(outcome.supplementary.map((t) => [t.origin, t.content])).toEqual([
      ["dom", "Price ₹592"],
    ]);
    // 캡처는 DOM/OCR이 공유
    expect(capturer.calls).toBe(1);
  });

  it("여러 OCR 엔진의 결과를 순서대로 이어 붙여야 함", async () => {
    const engines = [
      new FakeOcrEngine("tesseract", "Rating 4.3"),
      new FakeOcrEngine("vision", "Price ₹592"),
    ];

    const outcome = await strategy(
      new FakeCapturer(SAMPLE_CAPTURE),
      new FakeDomAdapter(RICH_DOM_TEXT),
      engines,
    ).acquire(request({ preferDomText: false }));

    expect(outcome.primary.content).toBe("Rating 4.3\nPrice ₹592");
    expect(outcome.primary.qualitySignal).toBe(18);
  });

  it("실패한 OCR 엔진은 건너뛰고 나머지 결과를 사용해야 함", async () => {
    const engines = [
      new FakeOcrEngine("tesseract", new Error("tesseract binary not found")),
      new FakeOcrEngine("vision", RICH_DOM_TEXT),
    ];

    const outcome = await strategy(
      new FakeCapturer(SAMPLE_CAPTURE),
      new FakeDomAdapter(""),
      engines,
    ).acquire(request({ preferDomText: false }));

    expect(outcome.primary.content).toBe(RICH_DOM_TEXT);
    expect(engines[1].calls).toBe(1);
  });

  it("DOM과 OCR이 모두 비활성이면 AcquisitionError여야 함", async () => {
    const capturer = new FakeCapturer(SAMPLE_CAPTURE);

    const reasons = await acquisitionReasons(
      strategy(capturer, new FakeDomAdapter(RICH_DOM_TEXT), []).acquire(
        request({ preferDomText: false, allowOcrFallback: false }),
      ),
    );

    expect(reasons).toEqual(["DOM and OCR acquisition are both disabled"]);
    expect(capturer.calls).toBe(0);
  });

  it("캡처 실패 시 DOM 어댑터는 마크업 없이 호출되어야 함", async () => {
    const dom = new FakeDomAdapter(RICH_DOM_TEXT);

    const outcome = await strategy(
      new FakeCapturer(new Error("navigation timeout")),
      dom,
      [],
    ).acquire(request());

    expect(outcome.primary.origin).toBe("dom");
    expect(dom.sources).toEqual([{ url: URL, renderedMarkup: null }]);
  });

  it("캡처 실패로 스크린샷이 없으면 OCR 사유를 모두 기록해야 함", async () => {
    const reasons = await acquisitionReasons(
      strategy(
        new FakeCapturer(new Error("navigation timeout")),
        new FakeDomAdapter(""),
        [new FakeOcrEngine("tesseract", RICH_DOM_TEXT)],
      ).acquire(request({ preferDomText: false })),
    );

    expect(reasons).toEqual([
      "Page capture failed: navigation timeout",
      "Screenshot unavailable for OCR",
    ]);
  });

  it("OCR 텍스트가 최소 품질 미만이면 실패 사유를 남겨야 함", async () => {
    const reasons = await acquisitionReasons(
      strategy(
        new FakeCapturer(SAMPLE_CAPTURE),
        new FakeDomAdapter(""),
        [new FakeOcrEngine("tesseract", "a b c")],
      ).acquire(request({ preferDomText: false })),
    );

    expect(reasons).toEqual(["Insufficient text extracted (3 < 10)"]);
  });

  it("OCR 엔진이 없으면 사유에 기록해야 함", async () => {
    const reasons = await acquisitionReasons(
      strategy(
        new FakeCapturer(SAMPLE_CAPTURE),
        new FakeDomAdapter(new Error("HTTP 403")),
        [],
      ).acquire(request()),
    );

    expect(reasons).toEqual([
      "DOM extraction failed: HTTP 403",
      "No OCR engine configured",
    ]);
  });

  it("OCR 전환 시점에 취소되었으면 CancelledError여야 함", async () => {
    const controller = new AbortController();
    controller.abort();
    const ocr = new FakeOcrEngine("tesseract", RICH_DOM_TEXT);

    await expect(
      strategy(
        new FakeCapturer(SAMPLE_CAPTURE),
        new FakeDomAdapter("short"),
        [ocr],
      ).acquire(request(), controller.signal),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(ocr.calls).toBe(0);
  });
});
