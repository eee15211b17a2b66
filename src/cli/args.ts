/**
 * CLI 인자 파싱
 *
 *   --url=<u> (반복 가능)  --csv=<file>  --fields=a,b
 *   --no-dom  --no-ocr  --concurrency=N  --debug  --output=<file>
 */

export interface CliOptions {
  urls: string[];
  csvPath: string | null;
  fields: string[] | undefined;
  preferDomText: boolean;
  allowOcrFallback: boolean;
  concurrency: number | undefined;
  debug: boolean;
  outputPath: string | null;
  help: boolean;
}

export const USAGE = `Usage: extract-attributes --url=<url> [--url=<url2>] [--csv=<file>]
  [--fields=rating,price] [--no-dom] [--no-ocr] [--concurrency=N]
  [--debug] [--output=<file>]`;

export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliArgumentError";
  }
}

function splitArg(arg: string): [string, string | null] {
  const eq = arg.indexOf("=");
  return eq === -1 ? [arg, null] : [arg.slice(0, eq), arg.slice(eq + 1)];
}

function requireValue(flag: string, value: string | null): string {
  if (value === null || value.trim() === "") {
    throw new CliArgumentError(`${flag} requires a value (${flag}=...)`);
  }
  return value.trim();
}

/**
 * @throws CliArgumentError - 알 수 없는 플래그, 값 누락, 잘못된 숫자
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    urls: [],
    csvPath: null,
    fields: undefined,
    preferDomText: true,
    allowOcrFallback: true,
    concurrency: undefined,
    debug: false,
    outputPath: null,
    help: false,
  };

  for (const arg of argv) {
    const [flag, value] = splitArg(arg);
    switch (flag) {
      case "--url":
        options.urls.push(requireValue(flag, value));
        break;
      case "--csv":
        options.csvPath = requireValue(flag, value);
        break;
      case "--fields":
        options.fields = requireValue(flag, value)
          .split(",")
          .map((name) => name.trim())
          .filter((name) => name.length > 0);
        break;
      case "--no-dom":
        options.preferDomText = false;
        break;
      case "--no-ocr":
        options.allowOcrFallback = false;
        break;
      case "--concurrency": {
        const parsed = Number(requireValue(flag, value));
        if (!Number.isInteger(parsed) || parsed < 1) {
          throw new CliArgumentError("--concurrency must be a positive integer");
        }
        options.concurrency = parsed;
        break;
      }
      case "--debug":
        options.debug = true;
        break;
      case "--output":
        options.outputPath = requireValue(flag, value);
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      default:
        throw new CliArgumentError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}
