import type { Server } from "node:http";
import type { Express } from "express";
import { PDFDocument, StandardFonts } from "pdf-lib";
import { loadConfig, type AppConfig } from "../src/config";
import type { TextGenerator } from "../src/services/llm";
import { SECTIONS, sectionMarker } from "../src/services/sections";

/** A one-page-per-entry PDF with the given text lines drawn on each page. */
export async function makePdf(pages: string[]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  for (const text of pages) {
    const page = doc.addPage();
    page.drawText(text, { x: 50, y: 700, size: 12, font });
  }
  return doc.save();
}

/** Model reply with every heading in order; bodies default to "Body of <name>." */
export function cannedReply(bodies: Partial<Record<string, string>> = {}): string {
  return SECTIONS.map(
    (name, i) => `${sectionMarker(i, name)}\n${bodies[name] ?? `Body of ${name}.`}\n`
  ).join("\n");
}

export class FakeGenerator implements TextGenerator {
  readonly defaultModel = "fake-flash";
  readonly prompts: string[] = [];

  constructor(private readonly reply: string | Error) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...loadConfig({}), ...overrides };
}

export type Running = { url: string; close: () => Promise<void> };

export async function listen(app: Express): Promise<Running> {
  const server: Server = await new Promise((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  const { port } = address;
  return {
    url: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
