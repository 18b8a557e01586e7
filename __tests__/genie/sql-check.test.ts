import { describe, it, expect } from "vitest";
import { checkSqlSanity, extractTableReferences, tokenizeSql } from "@/lib/genie/sql-check";

describe("checkSqlSanity", () => {
  it("accepts ordinary queries", () => {
    expect(checkSqlSanity("SELECT COUNT(*) FROM main.sales.orders WHERE status = 'OPEN'")).toEqual({ ok: true });
  });

  it("rejects blank text", () => {
    expect(checkSqlSanity("   \n")).toEqual({ ok: false, reason: "Empty SQL query" });
  });

  it("counts parentheses without regard to quoting", () => {
    expect(checkSqlSanity("SELECT * FROM t WHERE x = '('")).toEqual({
      ok: false,
      reason: "Unbalanced parentheses",
    });
    expect(checkSqlSanity("SELECT * FROM t WHERE (")).toEqual({ ok: false, reason: "Unbalanced parentheses" });
  });

  it("rejects an odd number of single quotes", () => {
    expect(checkSqlSanity("SELECT 'abc")).toEqual({ ok: false, reason: "Unbalanced single quotes" });
  });

  it("treats doubled quotes as balanced and ignores backslash escapes", () => {
    expect(checkSqlSanity("SELECT 'it''s'")).toEqual({ ok: true });
    expect(checkSqlSanity("SELECT 'it\\'s'")).toEqual({ ok: true });
  });

  it("rejects comment-only text", () => {
    expect(checkSqlSanity("-- nothing here\n/* or here */")).toEqual({
      ok: false,
      reason: "SQL contains no tokens (only comments?)",
    });
  });
});

describe("tokenizeSql", () => {
  it("classifies tokens and drops comments", () => {
    const tokens = tokenizeSql("SELECT `a b`, 'x' -- note\nFROM t WHERE n >= 1.5");
    expect(tokens).toEqual([
      { kind: "word", text: "SELECT" },
      { kind: "quoted_identifier", text: "`a b`" },
      { kind: "punctuation", text: "," },
      { kind: "string", text: "'x'" },
      { kind: "word", text: "FROM" },
      { kind: "word", text: "t" },
      { kind: "word", text: "WHERE" },
      { kind: "word", text: "n" },
      { kind: "operator", text: ">=" },
      { kind: "number", text: "1.5" },
    ]);
  });
});

describe("extractTableReferences", () => {
  it("returns distinct three-part names in order", () => {
    const sql =
      "SELECT o.id FROM main.sales.orders o JOIN `main.sales.customers` c ON o.cid = c.id JOIN main.sales.orders x ON 1 = 1";
    expect(extractTableReferences(sql)).toEqual(["main.sales.orders", "main.sales.customers"]);
  });

  it("takes the table prefix of a column reference", () => {
    expect(extractTableReferences("SELECT main.sales.orders.amount FROM x")).toEqual(["main.sales.orders"]);
  });

  it("reads names quoted part by part", () => {
    expect(extractTableReferences("SELECT * FROM `main`.`sales`.`orders` JOIN main.`sales`.items i ON 1 = 1")).toEqual([
      "main.sales.orders",
      "main.sales.items",
    ]);
  });

  it("ignores two-part names", () => {
    expect(extractTableReferences("SELECT * FROM sales.orders")).toEqual([]);
  });
});
