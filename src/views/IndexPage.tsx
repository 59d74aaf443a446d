// src/views/IndexPage.tsx
import { Layout } from "./Layout";

export type FormValues = { title?: string; authors?: string; notes?: string };

export type IndexPageProps = {
  maxMb: number;
  error?: string;
  values?: FormValues;
};

export function IndexPage({ maxMb, error, values = {} }: IndexPageProps) {
  return (
    <Layout title="Paper Breakdown">
      <h1>Paper Breakdown</h1>
      <p className="meta">
        Upload a research paper and get a plain-language breakdown in eleven sections.
      </p>
      {error ? <p className="error">{error}</p> : null}
      <form method="post" action="/" encType="multipart/form-data">
        <label htmlFor="pdf_file">PDF file (up to {maxMb} MB)</label>
        <input id="pdf_file" type="file" name="pdf_file" accept="application/pdf,.pdf" required />

        <label htmlFor="title">Title</label>
        <input id="title" type="text" name="title" defaultValue={values.title} required />

        <label htmlFor="authors">Authors / year</label>
        <input id="authors" type="text" name="authors" defaultValue={values.authors} />

        <label htmlFor="notes">Notes / audience</label>
        <textarea id="notes" name="notes" rows={3} defaultValue={values.notes} />

        <button type="submit">Analyze</button>
      </form>
    </Layout>
  );
}
