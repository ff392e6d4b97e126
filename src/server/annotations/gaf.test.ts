import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { fileURLToPath } from "node:url";
import { DatasetUnavailableError } from "@/server/errors";
import { describeGafSchema, gafColumnNames, parseGafLine, readGafFile } from "@/server/annotations/gaf";

const fixturePath = fileURLToPath(new URL("./fixtures/sample.gaf", import.meta.url));

describe("GAF parsing", () => {
  it("skips header and blank lines", () => {
    assert.equal(parseGafLine("!gaf-version: 2.2"), null);
    assert.equal(parseGafLine("   "), null);
  });

  it("pads short lines to the full column set", () => {
    const row = parseGafLine("UniProtKB\tP1\tINSR\tenables\tGO:0005009");
    assert.equal(row?.length, gafColumnNames.length);
    assert.equal(row?.[2], "INSR");
    assert.equal(row?.[16], "");
  });

  it("drops a trailing carriage return", () => {
    const fields = "A\tB\tC\tD\tE\tF\tG\tH\tI\tJ\tK\tL\tM\tN\tO\tP\tQ\r";
    assert.equal(parseGafLine(fields)?.[16], "Q");
  });

  it("streams annotation rows from a file", async () => {
    const symbols: string[] = [];
    for await (const row of readGafFile(fixturePath)) symbols.push(row[2] ?? "");
    assert.deepEqual(symbols, ["BRCA1", "BRCA1", "BRCA1", "INSR", "INSR", "TP53", "TP53"]);
  });

  it("reports a missing file as an unavailable dataset", async () => {
    const rows = readGafFile(fileURLToPath(new URL("./fixtures/missing.gaf", import.meta.url)));
    await assert.rejects(rows.next(), DatasetUnavailableError);
  });

  it("reports a directory as an unavailable dataset", async () => {
    const rows = readGafFile(fileURLToPath(new URL("./fixtures/", import.meta.url)));
    await assert.rejects(rows.next(), (error: unknown) => {
      assert.ok(error instanceof DatasetUnavailableError);
      assert.match(error.message, /^GAF file could not be read: /);
      return true;
    });
  });

  it("describes the renamed reference column", () => {
    assert.match(describeGafSchema(), /^- DB_Reference: /m);
  });
});
