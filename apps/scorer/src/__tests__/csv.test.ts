import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { parseCsv, parseCsvRows } from "../ingest/csv";

describe("parseCsvRows", () => {
  it("handles quoted commas, escaped quotes, quoted newlines and CRLF", () => {
    const text = 'a,b\r\n"x, y","he said ""hi"""\r\n\r\n1,"line1\nline2"\n';
    assert.deepEqual(parseCsvRows(text), [
      ["a", "b"],
      ["x, y", 'he said "hi"'],
      ["1", "line1\nline2"],
    ]);
  });

  it("keeps delimiter-only rows and a final row without a newline", () => {
    assert.deepEqual(parseCsvRows("a,b\n,\nc,d"), [
      ["a", "b"],
      ["", ""],
      ["c", "d"],
    ]);
  });

  it("rejects an unterminated quote", () => {
    assert.throws(() => parseCsvRows('a\n"open'), /CSV_UNTERMINATED_QUOTE: row 2/);
  });
});

describe("parseCsv", () => {
  it("keys records by the trimmed header and strips a BOM", () => {
    const t = parseCsv("\uFEFF id , name \nP1,Apollo\nP2\n");
    assert.deepEqual(t.header, ["id", "name"]);
    assert.deepEqual(t.records, [{ id: "P1", name: "Apollo" }, { id: "P2" }]);
  });

  it("returns an empty table for empty text", () => {
    assert.deepEqual(parseCsv(""), { header: [], records: [] });
  });
});
