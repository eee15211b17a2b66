#!/usr/bin/env node
/**
 * 상품 속성 추출 CLI
 *
 * 사용법:
 *   npm run extract -- --url=https://shop.example/p/1 --fields=rating,price,mrp
 *   npm run extract -- --csv=urls.csv --concurrency=3 --output=results.json
 */

import "dotenv/config";
import * as fs from "fs/promises";
import { CliArgumentError, parseCliArgs, USAGE } from "@/cli/args";
import { logger } from "@/config/logger";
import { createExtractionServices } from "@/services/ExtractionServiceFactory";
import { summarize } from "@/services/BatchExtractionService";
import { readUrlsFromCsv } from "@/utils/CsvUrlReader";
import { errorMessage } from "@/utils/async";

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const urls = [...options.urls];
  if (options.csvPath) {
    const content = await fs.readFile(options.csvPath, "utf-8");
    urls.push(...readUrlsFromCsv(content).urls);
  }
  if (urls.length === 0) {
    throw new CliArgumentError("At least one --url or a --csv file is required");
  }

  const services = createExtractionServices();
  try {
    const results = await services.batch.extractMany(
      urls,
      {
        fields: options.fields,
        preferDomText: options.preferDomText,
        allowOcrFallback: options.allowOcrFallback,
        debug: options.debug,
      },
      options.concurrency,
    );

    const json = JSON.stringify(results, null, 2);
    if (options.outputPath) {
      await fs.writeFile(options.outputPath, `${json}\n`, "utf-8");
      logger.info(
        { output: options.outputPath, ...summarize(results) },
        "[CLI] 결과 저장 완료",
      );
    } else {
      process.stdout.write(`${json}\n`);
    }
    return results.every((r) => r.error === null) ? 0 : 2;
  } finally {
    await services.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof CliArgumentError) {
      console.error(`${error.message}\n\n${USAGE}`);
      process.exitCode = 1;
      return;
    }
    logger.error({ error: errorMessage(error) }, "[CLI] 실행 실패");
    process.exitCode = 1;
  });
