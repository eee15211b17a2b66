/**
 * CSV URL Reader
 *
 * 업로드된 CSV에서 추출 대상 URL 목록을 읽음
 * - 헤더에 url/link 계열 컬럼이 있으면 해당 컬럼, 없으면 첫 번째 컬럼
 * - 첫 행이 URL이면 헤더 없는 파일로 간주
 * - http(s)가 아닌 값은 건너뜀, 중복은 첫 번째만 유지
 */

const URL_COLUMN_NAMES = ["url", "link", "product_url", "href", "uri"];

export interface CsvUrlReadResult {
  urls: string[];
  /** 건너뛴 행 수 (빈 값/잘못된 URL/중복) */
  skipped: number;
}

export function isValidUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * 최소 CSV 행 파서 (따옴표 필드, "" 이스케이프 지원)
 */
export function parseCsvRow(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

function findUrlColumn(headers: string[]): number {
  const normalized = headers.map((h) => h.trim().toLowerCase());
  for (const name of URL_COLUMN_NAMES) {
    const index = normalized.indexOf(name);
    if (index !== -1) return index;
  }
  return 0;
}

/**
 * CSV 본문에서 URL 목록 추출
 * @throws Error - 빈 파일
 */
export function readUrlsFromCsv(content: string): CsvUrlReadResult {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== "");
  if (lines.length === 0) {
    throw new Error("CSV file is empty");
  }

  // 헤더 없는 파일은 첫 행에서 URL이 있는 칸을 URL 컬럼으로 사용
  const firstRow = parseCsvRow(lines[0]);
  const urlCell = firstRow.findIndex((cell) => isValidUrl(cell.trim()));
  const hasHeader = urlCell === -1;
  const column = hasHeader ? findUrlColumn(firstRow) : urlCell;
  const dataLines = hasHeader ? lines.slice(1) : lines;

  const seen = new Set<string>();
  const urls: string[] = [];
  let skipped = 0;

  for (const line of dataLines) {
    const cell = (parseCsvRow(line)[column] ?? "").trim();
    if (!isValidUrl(cell) || seen.has(cell)) {
      skipped++;
      continue;
    }
    seen.add(cell);
    urls.push(cell);
  }

  return { urls, skipped };
}
