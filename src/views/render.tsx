// src/views/render.tsx
import { renderToStaticMarkup } from "react-dom/server";
import type { AnalysisResult } from "../types";
import { IndexPage, type IndexPageProps } from "./IndexPage";
import { ResultPage } from "./ResultPage";

const DOCTYPE = "<!DOCTYPE html>";

export function renderIndexPage(props: IndexPageProps): string {
  return DOCTYPE + renderToStaticMarkup(<IndexPage {...props} />);
}

export function renderResultPage(result: AnalysisResult): string {
  return DOCTYPE + renderToStaticMarkup(<ResultPage result={result} />);
}
