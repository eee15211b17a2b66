/**
 * DOM 텍스트 어댑터 (cheerio)
 *
 * 렌더링된 HTML에서 보이는 텍스트를 줄 단위로 추출
 * - script/style/noscript/svg/template 제거
 * - 블록 요소마다 줄바꿈, 빈 줄 제거
 * - HTML이 없으면 URL을 직접 요청 (캡처 실패 시)
 */

import * as cheerio from "cheerio";
import { BROWSER_CONFIG } from "@/config/constants";
import type {
  DomTextSource,
  IDomTextAdapter,
} from "@/core/interfaces/IDomTextAdapter";

const REMOVED_TAGS = "script, style, noscript, svg, template, iframe, head > link";

const BLOCK_TAGS = [
  "address", "article", "aside", "blockquote", "dd", "div", "dl", "dt",
  "figcaption", "footer", "form", "h1", "h2", "h3", "h4", "h5", "h6",
  "header", "li", "main", "nav", "ol", "p", "pre", "section", "table",
  "tr", "td", "th", "ul", "button", "label", "option", "select",
].join(", ");

/**
 * HTML → 텍스트 (한 줄에 한 블록)
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $(REMOVED_TAGS).remove();
  $("br").replaceWith("\n");
  $(BLOCK_TAGS).each((_, el) => {
    $(el).prepend("\n").append("\n");
  });

  const title = $("title").first().text().trim();
  $("title").remove();

  const body = $("body").length > 0 ? $("body").text() : $.root().text();
  const lines = body
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0);

  if (title && lines[0] !== title) {
    lines.unshift(title);
  }
  return lines.join("\n");
}

export class DomTextExtractor implements IDomTextAdapter {
  constructor(private readonly fetchImpl: typeof fetch = fetch) {}

  async extractText(source: DomTextSource): Promise<string> {
    const html = source.renderedMarkup ?? (await this.fetchHtml(source.url));
    return htmlToText(html);
  }

  private async fetchHtml(url: string): Promise<string> {
    const response = await this.fetchImpl(url, {
      headers: {
        "User-Agent": BROWSER_CONFIG.USER_AGENT,
        Accept: "text/html,application/xhtml+xml",
      },
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} while fetching page HTML`);
    }
    return response.text();
  }
}
