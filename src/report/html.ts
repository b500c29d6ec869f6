// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { ReportAggregate } from "../inactivity/types.js";
import { buildNarrative, type Block, type Fact, type NarrativeDocument } from "./narrative.js";

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

const STYLE = [
  "body { font-family: Segoe UI, Arial, sans-serif; margin: 2rem; color: #222; }",
  "h1 { border-bottom: 2px solid #0078d4; padding-bottom: .3rem; }",
  ".summary { display: flex; flex-wrap: wrap; gap: 1rem; }",
  ".stat { background: #f3f6fb; border-radius: 6px; padding: .6rem 1rem; min-width: 10rem; }",
  ".stat .value { font-size: 1.4rem; font-weight: 600; }",
  ".group { border: 1px solid #ddd; border-radius: 6px; margin: 1.5rem 0; padding: 0 1rem 1rem; }",
  ".group h2 small { color: #666; font-weight: normal; }",
  "table.facts td:first-child { color: #555; padding-right: 1.5rem; vertical-align: top; }",
  ".age { color: #a4262c; }",
  ".muted { color: #777; font-style: italic; }",
].join("\n");

function renderFact(fact: Fact): string {
  const age =
    fact.daysAgo === undefined ? "" : ` <span class="age">(${fact.daysAgo} days ago)</span>`;
  return `<tr><td>${escapeHtml(fact.label)}</td><td>${escapeHtml(fact.value)}${age}</td></tr>`;
}

function renderBlock(block: Block): string[] {
  switch (block.kind) {
    case "facts":
      return [
        `<h3>${escapeHtml(block.title)}</h3>`,
        `<table class="facts">`,
        ...block.facts.map(renderFact),
        `</table>`,
      ];
    case "list":
      if (block.items.length === 0) {
        return [`<h3>${escapeHtml(block.title)}</h3>`, `<p class="muted">${escapeHtml(block.emptyText)}</p>`];
      }
      return [
        `<h3>${escapeHtml(block.title)}</h3>`,
        `<ul>`,
        ...block.items.map((item) => `<li>${escapeHtml(item)}</li>`),
        `</ul>`,
      ];
    case "paragraph":
      return [`<p>${escapeHtml(block.text)}</p>`];
  }
}

function stat(label: string, value: string): string {
  return `<div class="stat"><div>${escapeHtml(label)}</div><div class="value">${escapeHtml(value)}</div></div>`;
}

/** Serialise a narrative document as a self-contained HTML page. */
export function renderHtml(doc: NarrativeDocument): string {
  const s = doc.summary;
  const lines: string[] = [];
  lines.push("<!DOCTYPE html>");
  lines.push(`<html lang="en">`);
  lines.push("<head>");
  lines.push(`<meta charset="utf-8">`);
  lines.push(`<title>${escapeHtml(doc.title)}</title>`);
  lines.push(`<style>\n${STYLE}\n</style>`);
  lines.push("</head>");
  lines.push("<body>");
  lines.push(`<h1>${escapeHtml(doc.title)}</h1>`);
  lines.push(`<p class="generated">Generated at ${escapeHtml(s.generatedAt)}</p>`);

  lines.push(`<section id="summary">`);
  lines.push("<h2>Summary</h2>");
  lines.push(`<div class="summary">`);
  lines.push(stat("Groups scanned", String(s.scanned)));
  lines.push(stat("Inactive groups", String(s.inactive)));
  lines.push(stat("Inactive rate", s.inactiveRate));
  lines.push(stat("Skipped (errors)", String(s.skipped)));
  lines.push("</div>");
  lines.push(
    `<p>Inactivity threshold: ${s.inactivityDays} days (no modification since ${escapeHtml(s.thresholdDate)}).</p>`,
  );
  lines.push(`<p>Message trace window: ${escapeHtml(s.traceWindow)}.</p>`);
  lines.push("</section>");

  lines.push(`<section id="groups">`);
  if (doc.sections.length === 0) {
    lines.push(`<p class="muted">No inactive groups found.</p>`);
  }
  for (const section of doc.sections) {
    lines.push(`<article class="group" id="${escapeHtml(section.anchor)}">`);
    lines.push(`<h2>${escapeHtml(section.title)} <small>${escapeHtml(section.subtitle)}</small></h2>`);
    for (const block of section.blocks) lines.push(...renderBlock(block));
    lines.push("</article>");
  }
  lines.push("</section>");

  if (doc.skipped.length > 0) {
    lines.push(`<section id="skipped">`);
    lines.push("<h2>Skipped groups</h2>");
    lines.push("<ul>");
    for (const item of doc.skipped) lines.push(`<li>${escapeHtml(item)}</li>`);
    lines.push("</ul>");
    lines.push("</section>");
  }

  lines.push(`<section id="recommendations">`);
  lines.push("<h2>Recommendations</h2>");
  lines.push("<ol>");
  for (const rec of doc.recommendations) lines.push(`<li>${escapeHtml(rec)}</li>`);
  lines.push("</ol>");
  lines.push("</section>");

  lines.push("</body>");
  lines.push("</html>");
  return lines.join("\n") + "\n";
}

export function renderNarrative(aggregate: ReportAggregate, now: Date): string {
  return renderHtml(buildNarrative(aggregate, now));
}
