// src/services/format.ts
import { createElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { SectionBody } from "../views/SectionBody";

export type FormattedBlock = {
  kind: "item" | "subheading" | "paragraph";
  text: string;
};

const BULLET = /^[•-]\s*/;
const NUMBERED = /^\d+\)/;
const BLOCK_END = /<\/(p|li|h[1-6]|ul|ol|div)>|<br\s*\/?>/gi;
const TAG = /<\/?[a-zA-Z][^>]*>/g;

const ENTITIES: [RegExp, string][] = [
  [/&lt;/g, "<"],
  [/&gt;/g, ">"],
  [/&quot;/g, '"'],
  [/&#x27;|&#39;/g, "'"],
  [/&amp;/g, "&"],
];

/** Drops HTML tags (block ends become newlines) and decodes the entities React emits. */
export function stripMarkup(text: string): string {
  let out = text.replace(BLOCK_END, "\n").replace(TAG, "");
  for (const [pattern, value] of ENTITIES) out = out.replace(pattern, value);
  return out;
}

/** Plain text for the PDF report: no tags, no emphasis asterisks. */
export function toPlainText(text: string): string {
  return stripMarkup(text).replace(/\*/g, "").trim();
}

/** Classifies each non-blank line on its own; order is preserved. */
export function classifyLines(text: string): FormattedBlock[] {
  const blocks: FormattedBlock[] = [];
  for (const rawLine of stripMarkup(text).replace(/\*/g, "").split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    if (BULLET.test(line)) {
      blocks.push({ kind: "item", text: line.replace(BULLET, "") });
    } else if (NUMBERED.test(line)) {
      blocks.push({ kind: "subheading", text: line });
    } else {
      blocks.push({ kind: "paragraph", text: line });
    }
  }
  return blocks;
}

export function formatSection(text: string): string {
  return renderToStaticMarkup(createElement(SectionBody, { blocks: classifyLines(text) }));
}
