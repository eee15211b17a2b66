/**
 * 추론 백엔드 인터페이스
 *
 * text-in/text-out 불투명 서비스
 * 가용성은 설정(자격 증명/리소스 유무)으로 결정되며 코어가 탐색하지 않음
 */

import type { BackendTier } from "@/core/domain/InferenceAttempt";

export interface IInferenceBackend {
  readonly tier: BackendTier;
  readonly name: string;

  /** 필요한 자격 증명/리소스가 설정되어 있는지 */
  isAvailable(): boolean;

  /**
   * 프롬프트 추론
   * @param signal - 시도별 타임아웃/취소 신호
   * @throws InferenceBackendError
   */
  infer(prompt: string, signal: AbortSignal): Promise<string>;
}
