// src/services/report.ts
import { PDFDocument, PDFFont, PDFPage, PageSizes, StandardFonts, rgb } from "pdf-lib";
import { SECTIONS, type SectionMap } from "./sections";

const MARGIN = 50;
const BODY_SIZE = 11;
const HEADING_SIZE = 14;
const TITLE_SIZE = 18;
const LINE_GAP = 4;

export type ReportInput = {
  title: string;
  generatedAt: Date;
  /** Plain text per section; markup must already be stripped. */
  sections: SectionMap;
};

/** Keeps alphanumerics, space, underscore and hyphen. */
export function sanitizeTitle(title: string): string {
  return title.replace(/[^A-Za-z0-9 _-]/g, "").trim();
}

export function reportFilename(title: string): string {
  const safe = sanitizeTitle(title).replace(/ /g, "_");
  return `${safe || "paper_summary"}.pdf`;
}

export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

/** Standard fonts only cover WinAnsi; anything else would make pdf-lib throw. */
function encodable(font: PDFFont): (text: string) => string {
  const supported = new Set(font.getCharacterSet());
  return (text) =>
    Array.from(text.replace(/⚠/g, "[!]").replace(/\t/g, "    "))
      .map((ch) => (supported.has(ch.codePointAt(0) ?? 0) ? ch : "?"))
      .join("");
}

function wrap(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const lines: string[] = [];
  let line = "";
  for (const word of text.split(/ +/)) {
    const candidate = line ? `${line} ${word}` : word;
    if (font.widthOfTextAtSize(candidate, size) <= maxWidth) {
      line = candidate;
      continue;
    }
    if (line) lines.push(line);
    // a single word wider than the page gets cut by characters
    let rest = word;
    while (font.widthOfTextAtSize(rest, size) > maxWidth && rest.length > 1) {
      let cut = rest.length - 1;
      while (cut > 1 && font.widthOfTextAtSize(rest.slice(0, cut), size) > maxWidth) cut--;
      lines.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    line = rest;
  }
  lines.push(line);
  return lines;
}

class ReportWriter {
  private page: PDFPage;
  private y: number;
  private readonly clean: (text: string) => string;

  constructor(
    private readonly doc: PDFDocument,
    private readonly regular: PDFFont,
    private readonly bold: PDFFont
  ) {
    this.page = doc.addPage(PageSizes.A4);
    this.y = this.page.getHeight() - MARGIN;
    this.clean = encodable(regular);
  }

  private get width(): number {
    return this.page.getWidth() - MARGIN * 2;
  }

  private ensureRoom(height: number): void {
    if (this.y - height >= MARGIN) return;
    this.page = this.doc.addPage(PageSizes.A4);
    this.y = this.page.getHeight() - MARGIN;
  }

  write(text: string, opts: { size?: number; bold?: boolean; gapAfter?: number } = {}): void {
    const size = opts.size ?? BODY_SIZE;
    const font = opts.bold ? this.bold : this.regular;
    for (const paragraph of this.clean(text).split(/\r?\n/)) {
      for (const line of wrap(paragraph.trimEnd(), font, size, this.width)) {
        this.ensureRoom(size + LINE_GAP);
        this.y -= size;
        this.page.drawText(line, { x: MARGIN, y: this.y, size, font, color: rgb(0, 0, 0) });
        this.y -= LINE_GAP;
      }
    }
    this.y -= opts.gapAfter ?? 0;
  }
}

/** Title, generation time, then every section in heading order. */
export async function buildReport(input: ReportInput): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const regular = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);

  doc.setTitle(input.title);
  doc.setCreationDate(input.generatedAt);

  const writer = new ReportWriter(doc, regular, bold);
  writer.write(input.title, { size: TITLE_SIZE, bold: true, gapAfter: 6 });
  writer.write(`Generated: ${formatTimestamp(input.generatedAt)}`, { gapAfter: 12 });

  for (const name of SECTIONS) {
    writer.write(name, { size: HEADING_SIZE, bold: true, gapAfter: 2 });
    writer.write(input.sections[name], { gapAfter: 10 });
  }

  return doc.save();
}
