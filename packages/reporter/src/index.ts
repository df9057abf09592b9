import type { OwnershipReport } from "@blameweight/core";
import type { OutputFormat, OutputSink, RendererOptions } from "./domain.js";
import { createOwnershipRenderer } from "./renderers.js";

export {
  CSV_HEADER,
  OUTPUT_FORMATS,
  type OutputFormat,
  type OutputSink,
  type OwnershipRenderer,
  type RendererOptions,
} from "./domain.js";
export { createOwnershipRenderer, notTrackedMessage } from "./renderers.js";

export const createBufferedSink = (): OutputSink & { contents: () => string } => {
  const chunks: string[] = [];
  return {
    write: (chunk) => {
      chunks.push(chunk);
    },
    contents: () => chunks.join(""),
  };
};

export const formatOwnershipReport = (
  report: OwnershipReport,
  format: OutputFormat,
  options: RendererOptions = {},
): string => {
  const sink = createBufferedSink();
  createOwnershipRenderer(format, options).render(report, sink);
  return sink.contents();
};
