import { padNumber } from "./domain.js";
import type { RecordSummary } from "./types.js";

// Markdown bodies written by the store. Record layout must stay in step
// with the parser in document.ts.

export type RecordTemplateInput = {
  number: number;
  title: string;
  date: string;
  statusLines: string[];
};

function recordHeader({ number, title, date, statusLines }: RecordTemplateInput): string[] {
  return [`# ${number}. ${title}`, "", `Date: ${date}`, "", "## Status", "", ...statusLines, ""];
}

export function renderNewRecord(input: RecordTemplateInput): string {
  return [
    ...recordHeader(input),
    "## Context",
    "",
    "[Describe the issue motivating this decision or change]",
    "",
    "## Decision",
    "",
    '[Describe the decision in active voice: "We will..."]',
    "",
    "## Consequences",
    "",
    "### Positive",
    "- [What becomes easier or possible]",
    "- [Benefit 2]",
    "",
    "### Negative",
    "- [What becomes harder or impossible]",
    "- [Trade-off 2]",
    "",
    "### Neutral",
    "- [Neither positive nor negative, but noteworthy]",
    "",
  ].join("\n");
}

export function renderSeedRecord(input: RecordTemplateInput): string {
  return [
    ...recordHeader(input),
    "## Context",
    "",
    "We need to record the architectural decisions made on this project to:",
    "- Help current and future team members understand why decisions were made",
    "- Provide context for architectural evolution",
    "- Enable better decision-making by learning from past choices",
    "- Document trade-offs explicitly",
    "",
    "## Decision",
    "",
    "We will use Architecture Decision Records (ADRs), as described by Michael Nygard, to document significant architectural decisions.",
    "",
    "An ADR consists of:",
    "- A title and number",
    "- Status (Proposed, Accepted, Deprecated, Superseded)",
    "- Context (what is the issue we're seeing that motivates this decision)",
    "- Decision (what we will do in response to the issue)",
    "- Consequences (what becomes easier or more difficult as a result)",
    "",
    "ADRs will be:",
    "- Stored together in this directory",
    "- Numbered sequentially (0001, 0002, etc.)",
    "- Written in Markdown",
    "- Committed to version control with code",
    "",
    "## Consequences",
    "",
    "### Positive",
    "- Architectural knowledge is captured and preserved",
    "- New team members can understand decision rationale",
    "- Decisions are made explicit and visible",
    "- Historical context is available when revisiting decisions",
    "",
    "### Negative",
    "- Requires discipline to document decisions",
    "- Takes time to write ADRs",
    '- Team must agree on what constitutes a "significant" decision',
    "",
    "### Neutral",
    "- ADRs become part of our development workflow",
    "- Will need tooling to help create and manage ADRs",
    "",
  ].join("\n");
}

const TABLE_HEAD = ["| ADR | Title | Date | Status |", "|-----|-------|------|--------|"];

function cell(value: string): string {
  return value.replace(/\|/g, "\\|");
}

function tableRows(records: RecordSummary[]): string[] {
  return records.map(
    (r) =>
      `| [${padNumber(r.number)}](${r.fileName}) | ${cell(r.title)} | ${cell(r.date)} | ${cell(r.statusLabel)} |`,
  );
}

export function renderIndex(active: RecordSummary[], deprecated: RecordSummary[]): string {
  return [
    "# Architecture Decision Records",
    "",
    "This directory contains Architecture Decision Records (ADRs) documenting significant architectural decisions for this project.",
    "",
    "## What is an ADR?",
    "",
    "An Architecture Decision Record (ADR) captures important architectural decisions made along with their context and consequences.",
    "",
    "## Format",
    "",
    "Each ADR follows this structure:",
    "- **Status**: Proposed, Accepted, Deprecated, or Superseded",
    "- **Context**: What is the issue motivating this decision?",
    "- **Decision**: What we will do (in active voice)",
    "- **Consequences**: What becomes easier or more difficult",
    "",
    "This file is generated; run `adr index` to rebuild it.",
    "",
    "## Active Decisions",
    "",
    ...TABLE_HEAD,
    ...tableRows(active),
    "",
    "## Deprecated Decisions",
    "",
    ...TABLE_HEAD,
    ...tableRows(deprecated),
    "",
  ].join("\n");
}

export function renderSupersededStatus(
  previousLabel: string,
  supersededBy: number,
  supersedingFileName: string,
): string[] {
  return [
    `~~${previousLabel}~~`,
    `**Superseded** by [ADR-${padNumber(supersededBy)}](${supersedingFileName})`,
  ];
}
