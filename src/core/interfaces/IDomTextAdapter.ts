/**
 * DOM 텍스트 어댑터 인터페이스
 */

export interface DomTextSource {
  url: string;
  /** 캡처된 HTML (없으면 어댑터가 URL로 직접 가져옴) */
  renderedMarkup: string | null;
}

export interface IDomTextAdapter {
  extractText(source: DomTextSource): Promise<string>;
}
