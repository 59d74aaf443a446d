// src/services/prompt.ts

export const NOT_PROVIDED = "Not provided";

export type PromptFields = {
  title?: string;
  authors?: string;
  /** Leading-page text from the PDF, or an extraction sentinel. */
  abstract?: string;
  notes?: string;
};

function orNotProvided(value: string | undefined): string {
  return value && value.trim() ? value : NOT_PROVIDED;
}

/**
 * Fills the breakdown prompt. Headings 0-10 must stay in step with SECTIONS in
 * ./sections, since the reply is split on "{n}) {heading}".
 */
export function buildPrompt(fields: PromptFields): string {
  const title = orNotProvided(fields.title);
  const authors = orNotProvided(fields.authors);
  const abstract = orNotProvided(fields.abstract);
  const notes = orNotProvided(fields.notes);

  return `
ROLE
You are an HCI researcher: curious, focused on what is new, and good at explaining theory to non-experts without jargon. Turn a dense research paper into clear, teachable insights.

INPUT PAPER
Title: ${title}
Authors/Year: ${authors}
Abstract (from PDF): ${abstract}
Notes/Audience: ${notes}

MISSION
Write a concise, structured breakdown that anyone can follow, while thinking like a researcher looking for novelty and real-world impact. When the paper does not report something, write "Not reported." Do not speculate unless you flag it.

OUTPUT RULES
- Plain language; define each technical term the first time you use it.
- Use the numbered headings exactly as written in the template, one per section, in order.
- Mark weak evidence, assumptions or speculative claims with ⚠ followed by a one-line reason.
- When you infer something, write "(Inference)" and say why.
- Never invent datasets, numbers or study details.

TEMPLATE
0) TL;DR (1-2 sentences)
   • What the paper is really about and its core contribution, in plain English.

1) Analogy
   • One vivid everyday analogy that maps the paper's idea onto a familiar situation.

2) Worked Example (concrete walk-through)
   • A short step-by-step story of someone using the idea or system in practice.

3) Dataset
   • Is there a dataset? Yes/No.
   • If yes: name, size, source, key variables or labels, licensing, collection method, limits and biases ⚠.
   • If no: what was used instead (formal model, prototype, design probes, simulated data) and how it was evaluated, if at all.

4) Modality
   • Inputs (touch, speech, gaze, sensors, logs, questionnaires).
   • Outputs and representations (visualization, haptics, AR, text).
   • Context (device, platform, setting).

5) Problem Statement
   • 1-2 sentences: whose problem this is and why current solutions fall short.

6) Methodology
   • Core approach (theory, model, system or design method).
   • The pipeline or steps, as a bullet list.
   • Study or evaluation, if any: type, N, tasks and measures, analysis. Mark under-powered or non-generalizable parts ⚠.

7) Key Findings
   • 3-6 bullets with the results that matter most for decisions.
   • Give effect sizes or numbers where reported; otherwise label it "qualitative claim" ⚠.

8) Research Gap Addressed
   • The specific gap in prior work this paper targets.
   • The gap that remains open after it ⚠.

9) Future Directions / Scope
   • Near term: concrete, feasible next steps (data, tooling, studies).
   • Mid to long term: ambitious directions and what they depend on.
   • Risks, ethical concerns and validity threats ⚠, with mitigations.

10) What Should You Read Yourself?
   • Yes/No with the reason.
   • If yes: 2-3 specific sections to read (for example "Section 3.2 Formalization" or "Appendix B study protocol") and why.
   • If no: why this breakdown is enough.
`.trim();
}
