import * as assert from "node:assert";

import {
  findSection,
  parseRecordDocument,
  parseStatusSection,
  readRecordFields,
  serializeRecordDocument,
  setSectionBody,
} from "../src/document.js";
import { renderNewRecord } from "../src/templates.js";

const RECORD = renderNewRecord({
  number: 2,
  title: "Use Kafka for events",
  date: "2026-10-19",
  statusLines: ["Proposed"],
});

suite("document", () => {
  test("re-emits an untouched record byte for byte", () => {
    assert.strictEqual(serializeRecordDocument(parseRecordDocument(RECORD)), RECORD);
  });

  test("re-emits CRLF records unchanged", () => {
    const crlf = RECORD.replace(/\n/g, "\r\n");
    assert.strictEqual(serializeRecordDocument(parseRecordDocument(crlf)), crlf);
  });

  test("splits level-2 sections and keeps level-3 headings inside them", () => {
    const doc = parseRecordDocument(RECORD);
    assert.deepStrictEqual(
      doc.sections.map((s) => s.heading),
      ["Status", "Context", "Decision", "Consequences"],
    );
    const consequences = findSection(doc, "consequences");
    assert.ok(consequences?.lines.includes("### Negative"));
  });

  test("ignores headings inside fenced code blocks", () => {
    const text = "# 1. T\n\n## Context\n\n```\n## Not a heading\n```\n";
    const doc = parseRecordDocument(text);
    assert.deepStrictEqual(doc.sections.map((s) => s.heading), ["Context"]);
    assert.strictEqual(serializeRecordDocument(doc), text);
  });

  test("reads title, date and status", () => {
    const fields = readRecordFields(parseRecordDocument(RECORD));
    assert.strictEqual(fields.title, "Use Kafka for events");
    assert.strictEqual(fields.date, "2026-10-19");
    assert.deepStrictEqual(fields.status, { kind: "known", value: "Proposed" });
  });

  test("leaves fields undefined when a record is malformed", () => {
    const fields = readRecordFields(parseRecordDocument("just some notes\n"));
    assert.deepStrictEqual(fields, {});
  });

  suite("setSectionBody", () => {
    test("replaces only the Status section", () => {
      const updated = setSectionBody(parseRecordDocument(RECORD), "Status", ["Accepted"]);
      assert.strictEqual(
        serializeRecordDocument(updated),
        RECORD.replace("## Status\n\nProposed\n", "## Status\n\nAccepted\n"),
      );
    });

    test("keeps CRLF endings on the rewritten lines", () => {
      const crlf = RECORD.replace(/\n/g, "\r\n");
      const updated = setSectionBody(parseRecordDocument(crlf), "Status", ["Accepted"]);
      assert.strictEqual(
        serializeRecordDocument(updated),
        crlf.replace("## Status\r\n\r\nProposed\r\n", "## Status\r\n\r\nAccepted\r\n"),
      );
    });

    test("adds a Status section when the record has none", () => {
      const doc = parseRecordDocument("# 1. T\n\nDate: 2026-01-01\n");
      const updated = setSectionBody(doc, "Status", ["Accepted"]);
      assert.strictEqual(
        serializeRecordDocument(updated),
        "# 1. T\n\nDate: 2026-01-01\n\n## Status\n\nAccepted\n",
      );
    });
  });

  suite("parseStatusSection", () => {
    test("recognises a superseded rendering", () => {
      const status = parseStatusSection([
        "",
        "~~Accepted~~",
        "**Superseded** by [ADR-0010](0010-use-x.md)",
        "",
      ]);
      assert.deepStrictEqual(status, { kind: "known", value: "Superseded", supersededBy: 10 });
    });

    test("reads the first non-blank line", () => {
      assert.deepStrictEqual(parseStatusSection(["", "", "deprecated", ""]), {
        kind: "known",
        value: "Deprecated",
      });
    });

    test("returns undefined for an empty section", () => {
      assert.strictEqual(parseStatusSection(["", ""]), undefined);
    });
  });
});
