import type { OwnershipReport } from "@blameweight/core";

export type OutputFormat = "tree" | "csv" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["tree", "csv", "json"];

export const CSV_HEADER = ["path", "owner", "score"] as const;

export interface OutputSink {
  write(chunk: string): void;
}

export type RendererOptions = {
  header?: boolean;
};

export type OwnershipRenderer = {
  format: OutputFormat;
  render: (report: OwnershipReport, sink: OutputSink) => void;
};
