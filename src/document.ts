import { KNOWN_STATUSES } from "./config.js";
import type { RecordDocument, RecordFields, RecordSection, RecordStatus } from "./types.js";

// A record is held as its preamble (title heading, Date line) plus the
// ordered "## " sections. Lines are kept raw, so serializing an untouched
// document gives back the exact input, CRLF endings included.

const FENCE = /^\s*(```|~~~)/;
const SECTION_HEADING = /^##\s+(.*?)\s*$/;
const TITLE_HEADING = /^#\s+(.*?)\s*$/;
const DATE_LINE = /^Date:\s*(.*?)\s*$/;
const SUPERSEDED_LINE = /^\*\*Superseded\*\*\s+by\s+\[ADR-(\d+)\]/i;
const SUPERSEDED_PLAIN = /^Superseded\s+by\s+(?:\[)?ADR-(\d+)/i;

function bare(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

function isBlank(line: string): boolean {
  return line.trim() === "";
}

export function parseRecordDocument(text: string): RecordDocument {
  const preamble: string[] = [];
  const sections: RecordSection[] = [];
  let current: RecordSection | null = null;
  let inFence = false;

  for (const line of text.split("\n")) {
    const plain = bare(line);
    if (FENCE.test(plain)) {
      inFence = !inFence;
    } else if (!inFence) {
      const heading = SECTION_HEADING.exec(plain);
      if (heading) {
        current = { heading: heading[1], headingLine: line, lines: [] };
        sections.push(current);
        continue;
      }
    }
    (current ? current.lines : preamble).push(line);
  }

  return { preamble, sections };
}

export function serializeRecordDocument(doc: RecordDocument): string {
  const out = [...doc.preamble];
  for (const section of doc.sections) {
    out.push(section.headingLine, ...section.lines);
  }
  return out.join("\n");
}

export function findSection(doc: RecordDocument, name: string): RecordSection | undefined {
  const wanted = name.toLowerCase();
  return doc.sections.find((s) => s.heading.toLowerCase() === wanted);
}

/**
 * Replaces the content of one section, keeping the blank lines that
 * separate it from the next heading. Other sections are left as they are.
 */
export function setSectionBody(doc: RecordDocument, name: string, body: string[]): RecordDocument {
  const existing = findSection(doc, name);
  const eol = detectEol(doc);
  const content = body.map((l) => `${l}${eol}`);

  if (!existing) {
    const section: RecordSection = {
      heading: name,
      headingLine: `## ${name}${eol}`,
      lines: [eol, ...content, eol],
    };
    const preamble = [...doc.preamble];
    if (preamble.length > 0 && !isBlank(preamble[preamble.length - 1])) {
      preamble.push(eol);
    }
    return { preamble, sections: [section, ...doc.sections] };
  }

  const rest = existing.lines.slice(1);
  let trailing = 0;
  while (trailing < rest.length && isBlank(rest[rest.length - 1 - trailing])) {
    trailing += 1;
  }
  const kept = rest.slice(rest.length - trailing);
  const replaced: RecordSection = { ...existing, lines: [eol, ...content, ...kept] };

  return {
    preamble: doc.preamble,
    sections: doc.sections.map((s) => (s === existing ? replaced : s)),
  };
}

function detectEol(doc: RecordDocument): string {
  const sample = doc.sections[0]?.headingLine ?? doc.preamble[0] ?? "";
  return sample.endsWith("\r") ? "\r" : "";
}

export function parseStatusText(text: string): RecordStatus {
  const plain = text.trim();
  const superseded = SUPERSEDED_PLAIN.exec(plain);
  if (superseded) {
    return { kind: "known", value: "Superseded", supersededBy: Number.parseInt(superseded[1], 10) };
  }
  const known = KNOWN_STATUSES.find((s) => s.toLowerCase() === plain.toLowerCase());
  return known ? { kind: "known", value: known } : { kind: "custom", value: plain };
}

export function parseStatusSection(lines: string[]): RecordStatus | undefined {
  const content = lines.map((l) => bare(l).trim()).filter(Boolean);
  if (content.length === 0) return undefined;

  for (const line of content) {
    const match = SUPERSEDED_LINE.exec(line);
    if (match) {
      return { kind: "known", value: "Superseded", supersededBy: Number.parseInt(match[1], 10) };
    }
  }
  return parseStatusText(content[0]);
}

export function readRecordFields(doc: RecordDocument): RecordFields {
  const fields: RecordFields = {};

  for (const raw of doc.preamble) {
    const line = bare(raw);
    if (fields.title === undefined) {
      const title = TITLE_HEADING.exec(line);
      if (title) {
        fields.title = title[1].replace(/^\d+\.\s*/, "") || undefined;
        continue;
      }
    }
    if (fields.date === undefined) {
      const date = DATE_LINE.exec(line);
      if (date && date[1]) {
        fields.date = date[1];
      }
    }
  }

  const status = findSection(doc, "Status");
  if (status) {
    fields.status = parseStatusSection(status.lines);
  }
  return fields;
}
