/**
 * 비동기 유틸리티
 *
 * - sleep: 지연 (abort 시 즉시 종료)
 * - withTimeout: 외부 호출 단위 타임아웃
 */

export class TimeoutError extends Error {
  constructor(
    label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * 지연
 * signal이 abort되면 타이머를 해제하고 바로 resolve
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * 타임아웃 적용 실행
 * timeoutMs가 0 이하이면 제한 없음
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);

    promise
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}

/**
 * 에러 메시지 추출
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
