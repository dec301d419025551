// packages/bom/__tests__/invariants.test.ts
import { describe, it, expect } from "vitest";
import { checkRecordInvariants } from "../src/invariants.js";
import { rec } from "./_helpers/records.js";

describe("checkRecordInvariants", () => {
  it("accepts a clean record set", () => {
    expect(checkRecordInvariants([rec("P1", "C1", 1, 2), rec("P2", "C1", 1, 2, "other.csv")])).toEqual([]);
  });

  it("treats a pair repeated in another file as a duplicate", () => {
    expect(checkRecordInvariants([rec("P1", "C1", 1, 2, "a.csv"), rec("P1", "C1", 1, 2, "b.csv")])).toEqual([
      { code: "DUPLICATE_PAIR", message: "Duplicate (P1, C1) in 'b.csv'", path: "/records/1" },
    ]);
  });

  it("reports every broken guarantee with its path", () => {
    const v = checkRecordInvariants([
      rec("P1", "C1", -1, 2),
      rec("P1", "C2", 1, 1.5),
      rec("P1", "C2", 1, 1),
      rec("P2", "C3", Number.NaN, -1),
    ]);

    expect(v.map((x) => `${x.code} ${x.path}`)).toEqual([
      "NEGATIVE_COST /records/0/unit_cost",
      "NON_INTEGER_QUANTITY /records/1/quantity",
      "DUPLICATE_PAIR /records/2",
      "NON_FINITE_VALUE /records/3/unit_cost",
      "NEGATIVE_QUANTITY /records/3/quantity",
    ]);
  });
});
