/**
 * Browser Launch Arguments
 *
 * SOLID 원칙:
 * - SRP: Browser 실행 인자 관리만 담당
 * - OCP: 카테고리별 확장 가능
 */

export const BROWSER_ARGS = {
  /**
   * 메모리 최적화 플래그
   */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage", // /dev/shm 사용 최소화
    "--disable-gpu",
    "--disable-software-rasterizer",
    "--disable-extensions",
    "--disable-background-networking",
    "--disable-default-apps",
    "--no-first-run",
  ],

  /**
   * Sandbox 플래그 (Docker 환경에서 필수)
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  /**
   * 기본 조합 (Docker + Memory)
   */
  get DEFAULT(): string[] {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED];
  },
} as const;
