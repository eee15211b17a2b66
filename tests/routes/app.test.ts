/**
 * HTTP API 테스트
 *
 * 주입된 fake 추출기로 앱을 loopback 포트에 띄워 요청/응답 형태 검증
 */

import { describe, it, expect, beforeAll, afterAll } from "@jest/globals";
import type { Server } from "http";
import { createApp } from "@/app";
import { APP_METADATA } from "@/config/constants";
import type { ExtractionInput, ExtractionResult } from "@/core/domain/Extraction";
import { BatchExtractionService, type SingleExtractor } from "@/services/BatchExtractionService";
import { silentLogger, testRegistry } from "../helpers/fakes";

const TIERS = { local: false, hostedPrimary: true, hostedSecondary: false };

const OK_RESULT: ExtractionResult = {
  values: { rating: 4.3 },
  source: "dom",
  warnings: [],
  error: null,
};

class StubExtractor implements SingleExtractor {
  readonly inputs: ExtractionInput[] = [];

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    this.inputs.push(input);
    return OK_RESULT;
  }
}

describe("HTTP API", () => {
  const extractor = new StubExtractor();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createApp({
      registry: testRegistry(),
      extractor,
      batch: new BatchExtractionService(extractor, { logger: silentLogger }),
      tiers: TIERS,
    });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve())),
    );
  });

  function postJson(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  describe("GET /health", () => {
    it("상태와 추론 티어 구성을 반환해야 함", async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(response.headers.get("x-request-id")).toBeTruthy();
      expect(await response.json()).toEqual({
        status: "ok",
        message: `${APP_METADATA.NAME} is running`,
        version: APP_METADATA.VERSION,
        inference: TIERS,
      });
    });
  });

  describe("GET /api/v1/fields", () => {
    it("사전 정의 필드와 기본 필드를 반환해야 함", async () => {
      const response = await fetch(`${baseUrl}/api/v1/fields`);

      expect(await response.json()).toMatchObject({
        success: true,
        data: {
          defaults: ["rating", "review"],
          fields: expect.arrayContaining([
            {
              key: "rating",
              type: "decimal",
              description: "Product rating (0.0 to 5.0)",
              example: "4.3",
              range: { min: 0, max: 5 },
              aliases: ["stars", "star rating"],
            },
          ]),
        },
      });
    });
  });

  describe("POST /api/v1/extract", () => {
    it("단일 URL은 결과 envelope을 그대로 반환해야 함", async () => {
      const response = await postJson("/api/v1/extract", {
        url: "https://shop.example/p/1",
        fields: ["rating"],
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ success: true, data: OK_RESULT });
      expect(extractor.inputs.at(-1)).toMatchObject({
        url: "https://shop.example/p/1",
        fields: ["rating"],
      });
    });

    it("urls 목록은 배치 결과와 요약을 반환해야 함", async () => {
      const response = await postJson("/api/v1/extract", {
        urls: ["https://shop.example/p/1", "https://shop.example/p/2"],
      });

      expect(await response.json()).toMatchObject({
        success: true,
        data: {
          results: [{ url: "https://shop.example/p/1" }, { url: "https://shop.example/p/2" }],
          summary: { total: 2, succeeded: 2, failed: 0 },
        },
      });
    });

    it("http(s)가 아닌 URL은 400이어야 함", async () => {
      const response = await postJson("/api/v1/extract", { url: "file:///etc/hosts" });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        success: false,
        error: {
          code: "VALIDATION_ERROR",
          message: "url: must be an absolute http(s) URL",
        },
      });
    });

    it("url과 urls가 모두 없으면 400이어야 함", async () => {
      const response = await postJson("/api/v1/extract", { fields: ["rating"] });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: { message: "Provide exactly one of url or urls" },
      });
    });

    it("잘못된 JSON 본문은 400이어야 함", async () => {
      const response = await fetch(`${baseUrl}/api/v1/extract`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Malformed JSON body" },
      });
    });
  });

  describe("POST /api/v1/extract/batch", () => {
    it("빈 urls는 400이어야 함", async () => {
      const response = await postJson("/api/v1/extract/batch", { urls: [] });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: { message: "urls: urls must not be empty" },
      });
    });
  });

  describe("POST /api/v1/extract/upload-csv", () => {
    function csvForm(csv: string | null, fields?: string): FormData {
      const form = new FormData();
      if (csv !== null) {
        form.append("file", new Blob([csv], { type: "text/csv" }), "urls.csv");
      }
      if (fields !== undefined) {
        form.append("fields", fields);
      }
      return form;
    }

    it("CSV의 URL을 요청 필드로 추출해야 함", async () => {
      const response = await fetch(`${baseUrl}/api/v1/extract/upload-csv`, {
        method: "POST",
        body: csvForm("url\nhttps://shop.example/p/9\n", "rating, price"),
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        data: { summary: { total: 1, succeeded: 1, failed: 0 } },
      });
      expect(extractor.inputs.at(-1)).toMatchObject({
        url: "https://shop.example/p/9",
        fields: ["rating", "price"],
      });
    });

    it("파일이 없으면 400이어야 함", async () => {
      const response = await fetch(`${baseUrl}/api/v1/extract/upload-csv`, {
        method: "POST",
        body: csvForm(null, "rating"),
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: { message: "CSV file is required (field: file)" },
      });
    });

    it("유효한 URL이 없으면 400이어야 함", async () => {
      const response = await fetch(`${baseUrl}/api/v1/extract/upload-csv`, {
        method: "POST",
        body: csvForm("url\nnot-a-url\n"),
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: { message: "CSV contains no valid http(s) URLs" },
      });
    });
  });

  it("등록되지 않은 경로는 404여야 함", async () => {
    const response = await fetch(`${baseUrl}/api/v1/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      success: false,
      error: { code: "NOT_FOUND", message: "Route not found: GET /api/v1/nope" },
    });
  });
});
