import type { GoldDocument } from "../schemas/dataset-schemas";
import type { LoaderWarning } from "../boundaries/dataset-loader";
import type { EvaluationReport } from "../evaluation/types";

export enum OutputFormat {
  Line = "line",
  Json = "json",
}

export interface LoadedGoldDocument {
  // File stem; prediction files are looked up by it
  fileId: string;
  path: string;
  document: GoldDocument;
}

export interface GoldSet {
  goldDir: string;
  documents: LoadedGoldDocument[];
}

export interface ModelRunOptions {
  model: string;
  predictionsDir: string;
  minConfidence: number;
  concurrency: number;
  verbose?: boolean | undefined;
}

export interface ModelRunResult {
  report: EvaluationReport;
  warnings: LoaderWarning[];
}
