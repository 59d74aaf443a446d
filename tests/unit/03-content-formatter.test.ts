import { describe, expect, it } from "vitest";
import {
  classifyLines,
  formatSection,
  stripMarkup,
  toPlainText,
} from "../../src/services/format";

describe("L1 · classifyLines", () => {
  it("classifies each line on its own", () => {
    const blocks = classifyLines(
      "**Core idea** in one line\n• first point\n- second point\n\n1) Step one\n   trailing paragraph  "
    );

    expect(blocks).toEqual([
      { kind: "paragraph", text: "Core idea in one line" },
      { kind: "item", text: "first point" },
      { kind: "item", text: "second point" },
      { kind: "subheading", text: "1) Step one" },
      { kind: "paragraph", text: "trailing paragraph" },
    ]);
  });

  it("drops blank lines and handles CRLF", () => {
    expect(classifyLines("a\r\n\r\n  \r\nb")).toEqual([
      { kind: "paragraph", text: "a" },
      { kind: "paragraph", text: "b" },
    ]);
  });

  it("returns nothing for empty text", () => {
    expect(classifyLines("")).toEqual([]);
  });
});

describe("L1 · formatSection", () => {
  it("renders paragraphs, grouped list items and subheadings", () => {
    const html = formatSection("Intro\n• one\n• two\n2) Later\nOutro");
    expect(html).toBe("<p>Intro</p><ul><li>one</li><li>two</li></ul><h4>2) Later</h4><p>Outro</p>");
  });

  it("starts a new list after an interrupting line", () => {
    expect(formatSection("- a\nbreak\n- b")).toBe(
      "<ul><li>a</li></ul><p>break</p><ul><li>b</li></ul>"
    );
  });

  it("escapes model text", () => {
    expect(formatSection("Accuracy < 5% & <script>x</script>")).toBe(
      "<p>Accuracy &lt; 5% &amp; x</p>"
    );
  });

  it("is idempotent on plain paragraphs", () => {
    const once = formatSection("First paragraph.\nSecond paragraph.");
    expect(once).toBe("<p>First paragraph.</p><p>Second paragraph.</p>");
    expect(formatSection(once)).toBe(once);
  });
});

describe("L1 · stripMarkup", () => {
  it("turns block ends into newlines and decodes entities", () => {
    expect(stripMarkup("<p>a &amp; b</p><ul><li>c &lt; d</li></ul>")).toBe("a & b\nc < d\n\n");
  });

  it("leaves a lone less-than sign alone", () => {
    expect(stripMarkup("x < y")).toBe("x < y");
  });

  it("toPlainText also drops emphasis glyphs and trims", () => {
    expect(toPlainText("<p>**Bold** claim</p>")).toBe("Bold claim");
  });
});
