// src/views/ResultPage.tsx
import { SECTIONS } from "../services/sections";
import type { AnalysisResult } from "../types";
import { Layout } from "./Layout";

export function downloadUrlFor(result: Pick<AnalysisResult, "id" | "title">): string {
  return `/download_pdf/${encodeURIComponent(result.title)}?id=${encodeURIComponent(result.id)}`;
}

export function ResultPage({ result }: { result: AnalysisResult }) {
  return (
    <Layout title={`${result.title} · Paper Breakdown`}>
      <h1>{result.title}</h1>
      {result.authors ? <p className="meta">{result.authors}</p> : null}
      <p>
        <a className="button" href={downloadUrlFor(result)}>
          Download PDF report
        </a>{" "}
        <a href="/">Analyze another paper</a>
      </p>
      {SECTIONS.map((name) => (
        <section className="section" key={name}>
          <h2>{name}</h2>
          {/* formatted by services/format, which escapes through React */}
          <div className="section-body" dangerouslySetInnerHTML={{ __html: result.formatted[name] }} />
        </section>
      ))}
    </Layout>
  );
}
