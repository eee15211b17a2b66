/**
 * Playwright 페이지 캡처 어댑터
 *
 * 책임:
 * 1. 공유 브라우저 생명주기 (최초 사용 시 launch, Mutex로 중복 launch 방지)
 * 2. 캡처마다 새 컨텍스트 (요청 간 쿠키/상태 공유 없음)
 * 3. 네비게이션 (domcontentloaded 실패 시 load로 1회 재시도, networkidle은 best-effort)
 * 4. 차단/에러 페이지 감지 → 캡처 실패
 * 5. 전체 페이지 스크린샷 + 렌더링된 HTML
 */

import { chromium } from "playwright";
import type { Browser, Page } from "playwright";
import { Mutex } from "async-mutex";
import * as fs from "fs/promises";
import * as path from "path";
import { BROWSER_ARGS } from "@/config/BrowserArgs";
import { ACQUISITION_CONFIG, BROWSER_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import type { IPageCapturer, PageCapture } from "@/core/interfaces/IPageCapturer";

export interface PageCapturerOptions {
  headless?: boolean;
  navigationTimeoutMs?: number;
  /** 설정 시 스크린샷을 파일로도 저장 */
  screenshotDir?: string | null;
}

/**
 * 차단/에러 페이지 제목 패턴
 */
const BLOCKED_TITLE_PATTERNS = [
  /access denied/i,
  /\bblocked\b/i,
  /captcha/i,
  /robot check/i,
  /are you a human/i,
  /^\s*(?:404|500|502|503)\b/,
  /page not found|server error|service unavailable/i,
];

/**
 * 페이지가 차단/에러 페이지인지 판단
 * @returns 차단 사유, 정상이면 null
 */
export function detectBlockedPage(title: string): string | null {
  const matched = BLOCKED_TITLE_PATTERNS.find((pattern) => pattern.test(title));
  return matched ? `Blocked or error page detected (title: "${title}")` : null;
}

export class PlaywrightPageCapturer implements IPageCapturer {
  private browser: Browser | null = null;
  private readonly mutex = new Mutex();
  private readonly headless: boolean;
  private readonly navigationTimeoutMs: number;
  private readonly screenshotDir: string | null;

  constructor(options: PageCapturerOptions = {}) {
    this.headless = options.headless ?? BROWSER_CONFIG.HEADLESS;
    this.navigationTimeoutMs =
      options.navigationTimeoutMs ?? ACQUISITION_CONFIG.CAPTURE_TIMEOUT_MS;
    this.screenshotDir =
      options.screenshotDir === undefined
        ? BROWSER_CONFIG.SCREENSHOT_DIR
        : options.screenshotDir;
  }

  /**
   * 공유 브라우저 조회 (연결이 끊겼으면 재생성)
   */
  private async getBrowser(): Promise<Browser> {
    return this.mutex.runExclusive(async () => {
      if (this.browser?.isConnected()) {
        return this.browser;
      }
      logger.info({ headless: this.headless }, "[PageCapturer] 브라우저 실행");
      this.browser = await chromium.launch({
        headless: this.headless,
        args: BROWSER_ARGS.DEFAULT,
      });
      return this.browser;
    });
  }

  async capture(url: string): Promise<PageCapture> {
    const browser = await this.getBrowser();
    const context = await browser.newContext({
      viewport: BROWSER_CONFIG.VIEWPORT,
      userAgent: BROWSER_CONFIG.USER_AGENT,
      locale: BROWSER_CONFIG.LOCALE,
    });

    try {
      const page = await context.newPage();
      await this.navigate(page, url);

      const blocked = detectBlockedPage(await page.title());
      if (blocked) {
        throw new Error(blocked);
      }

      const image = await page.screenshot({ fullPage: true, type: "png" });
      const renderedMarkup = await page.content().catch((error: unknown) => {
        logger.warn({ url, error }, "[PageCapturer] HTML 조회 실패");
        return null;
      });

      if (this.screenshotDir) {
        await this.saveScreenshot(url, image);
      }

      logger.info(
        { url, image_bytes: image.length, has_markup: renderedMarkup !== null },
        "[PageCapturer] 캡처 완료",
      );
      return { image, renderedMarkup };
    } finally {
      await context.close();
    }
  }

  /**
   * 네비게이션
   * - domcontentloaded 실패 시 load로 1회 재시도
   * - 지연 로딩 콘텐츠를 위해 스크롤 후 networkidle 대기 (타임아웃 무시)
   */
  private async navigate(page: Page, url: string): Promise<void> {
    try {
      await page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: this.navigationTimeoutMs,
      });
    } catch (error) {
      logger.warn(
        { url, error: error instanceof Error ? error.message : String(error) },
        "[PageCapturer] 네비게이션 실패, load 대기로 재시도",
      );
      await page.goto(url, { waitUntil: "load", timeout: this.navigationTimeoutMs });
    }

    await page.mouse.wheel(0, BROWSER_CONFIG.VIEWPORT.height * 2);
    await page
      .waitForLoadState("networkidle", {
        timeout: BROWSER_CONFIG.NETWORK_IDLE_TIMEOUT_MS,
      })
      .catch(() => {
        logger.debug({ url }, "[PageCapturer] networkidle 대기 시간 초과, 계속 진행");
      });
  }

  private async saveScreenshot(url: string, image: Buffer): Promise<void> {
    const dir = this.screenshotDir;
    if (!dir) return;
    const slug = new URL(url).hostname.replace(/[^a-z0-9]+/gi, "_");
    const filePath = path.join(dir, `${Date.now()}_${slug}.png`);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, image);
    logger.debug({ filePath }, "[PageCapturer] 스크린샷 저장");
  }

  /**
   * 브라우저 종료 (graceful shutdown)
   */
  async close(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.browser) {
        await this.browser.close();
        this.browser = null;
        logger.info("[PageCapturer] 브라우저 종료");
      }
    });
  }
}
