/**
 * Catalog loader tests.
 *
 * Run: node --import tsx --test src/catalog/loader.test.ts
 */

import { describe, test, before, after } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  loadCatalog,
  loadCatalogOrThrow,
  loadCatalogFile,
  readAuxiliaryText,
  CatalogValidationError,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const OSTI_ENTRY = {
  osti_id: 1001,
  title: "Solvent extraction of dysprosium",
  description: "  Separation factors for Dy/Tb in phosphonic acid systems.  ",
  authors: ["Doe, J.", "Roe, R."],
  subjects: ["rare earths", "solvent extraction"],
  publication_date: "2021-05-01",
  commodity_category: "HREE",
  doi: "10.0000/example",
};

const GENERIC_ENTRY = {
  record_id: "r-2",
  title: "Export licensing regimes",
  abstract: "",
  category_tag: "subdomain_G-PR",
};

let dir = "";

before(() => {
  dir = mkdtempSync(join(tmpdir(), "catalog-test-"));
});

after(() => {
  rmSync(dir, { recursive: true, force: true });
});

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

describe("loadCatalog", () => {
  test("normalizes OSTI field names", () => {
    const result = loadCatalog([OSTI_ENTRY]);
    assert.equal(result.success, true);
    assert.deepEqual(result.records?.[0], {
      recordId: "1001",
      categoryTag: "HREE",
      title: "Solvent extraction of dysprosium",
      abstract: "Separation factors for Dy/Tb in phosphonic acid systems.",
      authors: ["Doe, J.", "Roe, R."],
      subjects: ["rare earths", "solvent extraction"],
      publicationDate: "2021-05-01",
    });
  });

  test("accepts generic field names and defaults", () => {
    const result = loadCatalog([GENERIC_ENTRY]);
    const record = result.records?.[0];
    assert.equal(record?.recordId, "r-2");
    assert.equal(record?.categoryTag, "subdomain_G-PR");
    assert.equal(record?.abstract, "");
    assert.deepEqual(record?.authors, []);
    assert.equal(record?.publicationDate, undefined);
  });

  test("reports a missing id and tag", () => {
    const result = loadCatalog([{ title: "Untagged" }]);
    assert.equal(result.success, false);
    assert.deepEqual(
      result.errors?.map((e) => e.field),
      ["osti_id", "commodity_category"]
    );
    assert.equal(result.stats.invalid, 1);
  });

  test("reports duplicate ids across numeric and string forms", () => {
    const result = loadCatalog([OSTI_ENTRY, { ...GENERIC_ENTRY, record_id: "1001" }]);
    assert.equal(result.success, false);
    assert.equal(result.stats.duplicates, 1);
    assert.equal(result.errors?.[0]?.type, "duplicate");
    assert.equal(result.errors?.[0]?.index, 1);
  });

  test("rejects a non-array catalog", () => {
    const result = loadCatalog({ documents: [] });
    assert.equal(result.success, false);
    assert.equal(result.errors?.[0]?.message, "catalog must be a JSON array");
  });

  test("loadCatalogOrThrow formats every issue", () => {
    try {
      loadCatalogOrThrow([OSTI_ENTRY, { osti_id: 7, commodity_category: "LI" }]);
      assert.fail("expected CatalogValidationError");
    } catch (err) {
      assert.ok(err instanceof CatalogValidationError);
      assert.equal(err.format(), "Catalog validation failed:\n  - [entry 1] title: Required");
    }
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// AUXILIARY TEXT
// ═══════════════════════════════════════════════════════════════════════════

describe("auxiliary text", () => {
  test("prefers a recovered abstract over full text", () => {
    writeFileSync(join(dir, "a1.json"), JSON.stringify({ abstract: " Recovered. ", text: "Body." }));
    assert.equal(readAuxiliaryText(dir, "a1"), "Recovered.");
  });

  test("falls back to full text", () => {
    writeFileSync(join(dir, "a2.json"), JSON.stringify({ abstract: "", text: "Full body text." }));
    assert.equal(readAuxiliaryText(dir, "a2"), "Full body text.");
  });

  test("returns undefined without a file or usable text", () => {
    writeFileSync(join(dir, "a3.json"), JSON.stringify({ text: "   " }));
    assert.equal(readAuxiliaryText(dir, "a3"), undefined);
    assert.equal(readAuxiliaryText(dir, "missing"), undefined);
  });

  test("rejects an unreadable file", () => {
    writeFileSync(join(dir, "a4.json"), "{not json");
    assert.throws(() => readAuxiliaryText(dir, "a4"), CatalogValidationError);
  });

  test("rejects record ids that leave the text directory", () => {
    const escapes = (recordId: string) =>
      assert.throws(
        () => readAuxiliaryText(dir, recordId),
        (err: unknown) =>
          err instanceof CatalogValidationError &&
          err.issues[0]?.field === "recordId" &&
          err.issues[0]?.recordId === recordId
      );

    escapes("../outside");
    escapes("nested/a1");
    escapes("/etc/hosts");
  });

  test("loadCatalogFile attaches text only to records without an abstract", () => {
    const catalogPath = join(dir, "catalog.json");
    writeFileSync(catalogPath, JSON.stringify([OSTI_ENTRY, GENERIC_ENTRY]));
    writeFileSync(join(dir, "1001.json"), JSON.stringify({ text: "Ignored." }));
    writeFileSync(join(dir, "r-2.json"), JSON.stringify({ text: "Licensing text." }));

    const records = loadCatalogFile(catalogPath, { auxTextDir: dir });
    assert.equal(records[0]?.auxiliaryText, undefined);
    assert.equal(records[1]?.auxiliaryText, "Licensing text.");
  });

  test("loadCatalogFile reports unparseable JSON", () => {
    const catalogPath = join(dir, "broken.json");
    writeFileSync(catalogPath, "[");
    assert.throws(
      () => loadCatalogFile(catalogPath),
      (err: unknown) => err instanceof CatalogValidationError && err.issues[0]?.type === "file"
    );
  });
});
