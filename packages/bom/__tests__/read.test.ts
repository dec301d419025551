// packages/bom/__tests__/read.test.ts
import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { detectFormat, parseBomFileContent } from "../src/read.js";
import { normalizeBomFiles } from "../src/normalize.js";
import { ValidationError } from "../src/errors.js";
import { catchError } from "./_helpers/records.js";

describe("parseBomFileContent", () => {
  it("reads CSV text keeping identifiers as written", () => {
    const file = parseBomFileContent(
      "boms.csv",
      "product_id,component_id,unit_cost,quantity\nP1,00123,2.50,4\n"
    );

    expect(file.name).toBe("boms.csv");
    expect(normalizeBomFiles([file])).toEqual([
      { product_id: "P1", component_id: "00123", component_name: "00123", unit_cost: 2.5, quantity: 4, source_file: "boms.csv" },
    ]);
  });

  it("strips a UTF-8 byte order mark from the header row", () => {
    const file = parseBomFileContent("boms.csv", Buffer.from("\uFEFFproduct_id,component_id,unit_cost,quantity\nP1,C1,1,1\n", "utf8"));
    expect(Object.keys(file.rows[0])).toContain("product_id");
  });

  it("returns no rows for a header-only CSV", () => {
    expect(parseBomFileContent("empty.csv", "product_id,component_id,unit_cost,quantity\n").rows).toEqual([]);
  });

  it("reads the first sheet of an xlsx workbook", () => {
    const wb = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      wb,
      XLSX.utils.aoa_to_sheet([
        ["FG Code", "L2 Code", "L2 CostInBOM", "L2 Unti Qty"],
        ["FG1", "T1", 3, 2],
      ]),
      "BOM"
    );
    const bytes: Buffer = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });

    const file = parseBomFileContent("boms.xlsx", bytes);

    expect(file.rows).toEqual([{ "FG Code": "FG1", "L2 Code": "T1", "L2 CostInBOM": 3, "L2 Unti Qty": 2 }]);
  });

  it("rejects unsupported extensions at file level", () => {
    const err = catchError(() => parseBomFileContent("boms.txt", "a,b\n1,2\n"));

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ file: "boms.txt", row: null, field: null });
    expect((err as Error).message).toBe("boms.txt: is not a .csv, .xlsx or .xls file");
  });
});

describe("detectFormat", () => {
  it("dispatches on extension, case-insensitively", () => {
    expect(detectFormat("A.CSV")).toBe("csv");
    expect(detectFormat("b.xls")).toBe("xlsx");
    expect(detectFormat("c.json")).toBeNull();
  });
});
