import { validateSampleBatch, type SampleBatchResult } from "../validation";

const REQUIRED_COLUMNS = ["metricKind", "timestamp", "value"] as const;

function splitLine(line: string): string[] {
  return line.split(",").map((c) => c.trim().replace(/^"(.*)"$/, "$1"));
}

/**
 * Parses a `metricKind,timestamp,value` export. Column order follows the
 * header row; blank lines and `#` comments are skipped.
 */
export function parseSampleCsv(text: string): SampleBatchResult {
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  let header: string[] | null = null;
  const rows: Record<string, unknown>[] = [];
  const lineNumbers: number[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line || line.startsWith("#")) continue;
    const cells = splitLine(line);
    if (header == null) {
      header = cells;
      const missing = REQUIRED_COLUMNS.filter((c) => !cells.includes(c));
      if (missing.length > 0) {
        return { ok: false, errors: [`header: missing column(s) ${missing.join(", ")}`], samples: [] };
      }
      continue;
    }
    const row: Record<string, unknown> = {};
    header.forEach((col, j) => {
      const cell = cells[j];
      row[col] = col === "value" ? (cell === undefined || cell === "" ? undefined : Number(cell)) : cell;
    });
    rows.push(row);
    lineNumbers.push(i + 1);
  }

  if (header == null) {
    return { ok: false, errors: ["file is empty"], samples: [] };
  }

  const result = validateSampleBatch(rows);
  const errors = result.errors.map((e) =>
    e.replace(/^samples\[(\d+)\]/, (_m, idx: string) => `line ${lineNumbers[Number(idx)]}`),
  );
  return { ok: errors.length === 0, errors, samples: result.samples };
}
