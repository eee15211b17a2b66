/**
 * Tesseract CLI OCR 엔진
 *
 * `tesseract stdin stdout --psm 6` 프로세스에 PNG를 stdin으로 전달
 * - psm 6: 단일 균일 텍스트 블록 (상품 페이지 스크린샷에 적합)
 * - 시스템에 tesseract 바이너리가 설치되어 있어야 함
 */

import { spawn } from "child_process";
import { OCR_CONFIG } from "@/config/constants";
import type { IOcrEngine } from "@/core/interfaces/IOcrEngine";

/** stderr 누적 상한 */
const MAX_STDERR_LENGTH = 4000;

export interface TesseractOptions {
  binary?: string;
  psm?: number;
  language?: string;
  /** 프로세스 타임아웃 (SIGTERM) */
  timeoutMs?: number;
}

export class TesseractCliOcrEngine implements IOcrEngine {
  readonly name = "tesseract";
  private readonly binary: string;
  private readonly args: string[];
  private readonly timeoutMs: number;

  constructor(options: TesseractOptions = {}) {
    this.binary = options.binary ?? OCR_CONFIG.TESSERACT_BINARY;
    this.args = [
      "stdin",
      "stdout",
      "--psm",
      String(options.psm ?? OCR_CONFIG.TESSERACT_PSM),
      "-l",
      options.language ?? "eng",
    ];
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  extractText(image: Buffer): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const proc = spawn(this.binary, this.args, {
        timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined,
      });

      let stdout = "";
      let stderr = "";
      let settled = false;

      proc.stdout.on("data", (data: Buffer) => {
        stdout += data.toString("utf8");
      });
      proc.stderr.on("data", (data: Buffer) => {
        if (stderr.length < MAX_STDERR_LENGTH) {
          stderr += data.toString("utf8");
        }
      });

      proc.on("error", (err) => {
        if (settled) return;
        settled = true;
        reject(new Error(`Failed to start tesseract: ${err.message}`));
      });

      proc.on("close", (code, signal) => {
        if (settled) return;
        settled = true;
        if (code === 0) {
          resolve(stdout);
          return;
        }
        const reason = signal ? `signal ${signal}` : `exit code ${code}`;
        reject(new Error(`tesseract failed (${reason}): ${stderr.trim().slice(0, 500)}`));
      });

      proc.stdin.on("error", (err) => {
        if (settled) return;
        settled = true;
        reject(new Error(`Failed to write image to tesseract: ${err.message}`));
      });
      proc.stdin.end(image);
    });
  }
}
