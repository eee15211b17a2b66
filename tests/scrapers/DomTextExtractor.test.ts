/**
 * DomTextExtractor 테스트
 */

import { describe, it, expect, jest } from "@jest/globals";
import { DomTextExtractor, htmlToText } from "@/scrapers/DomTextExtractor";

describe("htmlToText", () => {
  it("블록 요소마다 줄을 나누고 스크립트/스타일을 제거해야 함", () => {
    const html = [
      "<html><head><title>Cotton Tee</title><style>.x{color:red}</style></head>",
      "<body><h1>Cotton Tee</h1>",
      "<div>Special   price <b>₹592</b></div>",
      "<script>var tracking = 1;</script>",
      "<p>In<br>Stock</p></body></html>",
    ].join("");

    expect(htmlToText(html)).toBe("Cotton Tee\nSpecial price ₹592\nIn\nStock");
  });

  it("본문 첫 줄과 다른 제목은 맨 앞에 추가해야 함", () => {
    const html = "<html><head><title>Shop - Tee</title></head><body><p>Tee</p></body></html>";

    expect(htmlToText(html)).toBe("Shop - Tee\nTee");
  });
});

describe("DomTextExtractor", () => {
  it("렌더링된 마크업이 있으면 요청하지 않아야 함", async () => {
    const fetchImpl = jest.fn<typeof fetch>();
    const extractor = new DomTextExtractor(fetchImpl);

    const text = await extractor.extractText({
      url: "https://shop.example/p/1",
      renderedMarkup: "<p>Rendered</p>",
    });

    expect(text).toBe("Rendered");
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("마크업이 없으면 URL을 직접 가져와야 함", async () => {
    const fetchImpl = jest
      .fn<typeof fetch>()
      .mockResolvedValue(new Response("<p>Fetched</p>", { status: 200 }));
    const extractor = new DomTextExtractor(fetchImpl);

    const text = await extractor.extractText({
      url: "https://shop.example/p/1",
      renderedMarkup: null,
    });

    expect(text).toBe("Fetched");
    expect(fetchImpl.mock.calls[0][0]).toBe("https://shop.example/p/1");
  });

  it("HTTP 에러 응답은 예외여야 함", async () => {
    const fetchImpl = jest
      .fn<typeof fetch>()
      .mockResolvedValue(new Response("denied", { status: 403 }));

    await expect(
      new DomTextExtractor(fetchImpl).extractText({
        url: "https://shop.example/p/1",
        renderedMarkup: null,
      }),
    ).rejects.toThrow("HTTP 403 while fetching page HTML");
  });
});
