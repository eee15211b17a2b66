/**
 * OCR 엔진 인터페이스
 *
 * 여러 엔진이 설정 순서대로 실행되고 결과는 이어 붙여짐
 */

export interface IOcrEngine {
  readonly name: string;
  extractText(image: Buffer): Promise<string>;
}
