import * as fs from "node:fs";
import * as path from "node:path";
import * as XLSX from "xlsx";

import { ValidationError } from "./errors.js";
import type { RawBomFile } from "./schema.js";

export type BomFileFormat = "csv" | "xlsx";

export function detectFormat(name: string): BomFileFormat | null {
  const ext = path.extname(name).toLowerCase();
  if (ext === ".csv") return "csv";
  if (ext === ".xlsx" || ext === ".xls") return "xlsx";
  return null;
}

/**
 * Parse one uploaded table. The first sheet is used and its first row is
 * taken as headers. CSV cells stay text so ids like "00123" survive.
 */
export function parseBomFileContent(name: string, content: string | Buffer): RawBomFile {
  const format = detectFormat(name);
  if (!format) {
    throw new ValidationError({
      file: name,
      row: null,
      field: null,
      reason: "is not a .csv, .xlsx or .xls file",
    });
  }

  const workbook =
    format === "csv"
      ? XLSX.read(stripByteOrderMark(typeof content === "string" ? content : content.toString("utf8")), {
          type: "string",
          raw: true,
        })
      : XLSX.read(typeof content === "string" ? Buffer.from(content, "binary") : content, { type: "buffer" });

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new ValidationError({ file: name, row: null, field: null, reason: "contains no sheets" });
  }

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: "" });
  return { name, rows };
}

export function readBomFile(filePath: string): RawBomFile {
  const abs = path.resolve(process.cwd(), filePath);
  return parseBomFileContent(path.basename(filePath), fs.readFileSync(abs));
}

function stripByteOrderMark(s: string): string {
  return s.charCodeAt(0) === 0xfeff ? s.slice(1) : s;
}
