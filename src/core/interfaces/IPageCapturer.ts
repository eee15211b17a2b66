/**
 * 페이지 캡처 어댑터 인터페이스
 *
 * SOLID 원칙:
 * - DIP: 획득 전략은 브라우저 구현(Playwright)이 아닌 이 추상화에 의존
 */

export interface PageCapture {
  /** 전체 페이지 스크린샷 (PNG) */
  image: Buffer;
  /** 렌더링된 HTML, 얻지 못했으면 null */
  renderedMarkup: string | null;
}

export interface IPageCapturer {
  /**
   * 페이지 렌더링 및 스크린샷 캡처
   * @throws 네비게이션/타임아웃/봇 차단 시
   */
  capture(url: string): Promise<PageCapture>;

  /** 공유 리소스 정리 (브라우저 종료 등) */
  close(): Promise<void>;
}
