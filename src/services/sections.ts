// src/services/sections.ts
import { MalformedResponseError } from "../errors";

/**
 * The eleven headings the prompt asks for. Index i is the heading number the model
 * is told to write, so the order here is the order of the markers in the reply.
 */
export const SECTIONS = [
  "TL;DR",
  "Analogy",
  "Worked Example",
  "Dataset",
  "Modality",
  "Problem Statement",
  "Methodology",
  "Key Findings",
  "Research Gap",
  "Future Directions",
  "What Should You Read Yourself?",
] as const;

export type SectionName = (typeof SECTIONS)[number];

/** Exactly one entry per heading, in heading order. */
export type SectionMap = Record<SectionName, string>;

export const SECTION_NOT_FOUND = "⚠ Section not found in model output";

export function sectionMarker(index: number, name: string): string {
  return `${index}) ${name}`;
}

/** Builds a SectionMap by calling `fn` for every heading in order. */
export function mapSections(fn: (name: SectionName, index: number) => string): SectionMap {
  return {
    "TL;DR": fn("TL;DR", 0),
    Analogy: fn("Analogy", 1),
    "Worked Example": fn("Worked Example", 2),
    Dataset: fn("Dataset", 3),
    Modality: fn("Modality", 4),
    "Problem Statement": fn("Problem Statement", 5),
    Methodology: fn("Methodology", 6),
    "Key Findings": fn("Key Findings", 7),
    "Research Gap": fn("Research Gap", 8),
    "Future Directions": fn("Future Directions", 9),
    "What Should You Read Yourself?": fn("What Should You Read Yourself?", 10),
  };
}

type MarkerHit = { name: SectionName; start: number; contentStart: number };

function isHit(hit: MarkerHit | undefined): hit is MarkerHit {
  return hit !== undefined;
}

function findMarkers(raw: string, sections: readonly SectionName[]): (MarkerHit | undefined)[] {
  return sections.map((name, index) => {
    const marker = sectionMarker(index, name);
    const start = raw.indexOf(marker);
    return start === -1 ? undefined : { name, start, contentStart: start + marker.length };
  });
}

function assertIncreasing(hits: MarkerHit[]): void {
  for (let i = 1; i < hits.length; i++) {
    const prev = hits[i - 1];
    const cur = hits[i];
    if (cur.start <= prev.start) {
      throw new MalformedResponseError(
        `The model reply lists "${cur.name}" before "${prev.name}", so its sections cannot be told apart. Please try again.`
      );
    }
  }
}

// markdown heading decoration ("### 1) ...", "**1) ...**") left at either end of a slice
const LEADING_DECORATION = /^[#*]+[ \t]*(?:\n|$)/;
const TRAILING_DECORATION = /(?:^|\n)[ \t]*[#*]+$/;

function cleanBody(text: string): string {
  return text.trim().replace(LEADING_DECORATION, "").replace(TRAILING_DECORATION, "").trim();
}

/**
 * Slices the model reply into sections by their numbered headings, `sections[i]` being
 * expected under marker `"{i}) {name}"`.
 *
 * Each section runs from the end of its own marker to the start of the next marker
 * that was found, or to the end of the text. A heading that is missing, or not in
 * `sections`, yields SECTION_NOT_FOUND. Markers found out of order raise
 * MalformedResponseError.
 */
export function splitSections(
  raw: string,
  sections: readonly SectionName[] = SECTIONS
): SectionMap {
  const hits = findMarkers(raw, sections);
  assertIncreasing(hits.filter(isHit));

  const bodies = new Map<SectionName, string>();
  hits.forEach((hit, index) => {
    if (!hit || bodies.has(hit.name)) return;
    const next = hits.slice(index + 1).find(isHit);
    bodies.set(hit.name, cleanBody(raw.slice(hit.contentStart, next ? next.start : raw.length)));
  });

  return mapSections((name) => bodies.get(name) ?? SECTION_NOT_FOUND);
}
