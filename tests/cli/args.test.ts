/**
 * CLI 인자 파싱 테스트
 */

import { describe, it, expect } from "@jest/globals";
import { CliArgumentError, parseCliArgs } from "@/cli/args";

describe("parseCliArgs", () => {
  it("인자가 없으면 기본값이어야 함", () => {
    expect(parseCliArgs([])).toEqual({
      urls: [],
      csvPath: null,
      fields: undefined,
      preferDomText: true,
      allowOcrFallback: true,
      concurrency: undefined,
      debug: false,
      outputPath: null,
      help: false,
    });
  });

  it("반복된 --url과 플래그를 모두 반영해야 함", () => {
    const options = parseCliArgs([
      "--url=https://a.example/1",
      "--url=https://a.example/2",
      "--fields=rating, price,,Operating System",
      "--no-dom",
      "--concurrency=3",
      "--debug",
      "--output=out/results.json",
    ]);

    expect(options.urls).toEqual(["https://a.example/1", "https://a.example/2"]);
    expect(options.fields).toEqual(["rating", "price", "Operating System"]);
    expect(options.preferDomText).toBe(false);
    expect(options.allowOcrFallback).toBe(true);
    expect(options.concurrency).toBe(3);
    expect(options.debug).toBe(true);
    expect(options.outputPath).toBe("out/results.json");
  });

  it("URL 값의 '='는 그대로 유지해야 함", () => {
    expect(parseCliArgs(["--url=https://a.example/p?id=7"]).urls).toEqual([
      "https://a.example/p?id=7",
    ]);
  });

  it("알 수 없는 인자는 CliArgumentError여야 함", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow(CliArgumentError);
    expect(() => parseCliArgs(["--verbose"])).toThrow("Unknown argument: --verbose");
  });

  it("값이 필요한 플래그에 값이 없으면 에러여야 함", () => {
    expect(() => parseCliArgs(["--csv"])).toThrow("--csv requires a value (--csv=...)");
  });

  it("동시성은 양의 정수여야 함", () => {
    expect(() => parseCliArgs(["--concurrency=0"])).toThrow(
      "--concurrency must be a positive integer",
    );
    expect(() => parseCliArgs(["--concurrency=1.5"])).toThrow(CliArgumentError);
  });
});
