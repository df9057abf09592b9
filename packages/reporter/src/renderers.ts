import { posix } from "node:path";
import type { OwnershipReport, OwnershipReportEntry, OwnershipReportOwner } from "@blameweight/core";
import { CSV_HEADER, type OutputSink, type OwnershipRenderer, type RendererOptions } from "./domain.js";

const round4 = (value: number): number => Number(value.toFixed(4));

const formatPercent = (fraction: number): string => `${(fraction * 100).toFixed(2).padStart(6)}%`;

const formatLineCount = (lines: number): string => (lines === 1 ? "1 line" : `${lines} lines`);

const entryLabel = (entry: OwnershipReportEntry): string => {
  if (entry.depth === 0) {
    return entry.path;
  }

  const name = posix.basename(entry.path);
  return entry.kind === "directory" ? `${name}/` : name;
};

const renderOwnerLine = (owner: OwnershipReportOwner, indent: string): string =>
  `${indent}${formatPercent(owner.fraction)} ${owner.name} (${owner.numerator}/${owner.denominator})`;

export const NOT_TRACKED_LABEL = "no owners (not tracked)";

export const notTrackedMessage = (rootPath: string): string => `${rootPath}: ${NOT_TRACKED_LABEL}`;

export const renderTree = (report: OwnershipReport, sink: OutputSink): void => {
  if (!report.available) {
    sink.write(`${notTrackedMessage(report.rootPath)}\n`);
    return;
  }

  for (const entry of report.entries) {
    const indent = "  ".repeat(entry.depth);
    sink.write(`${indent}${entryLabel(entry)} (${formatLineCount(entry.totalLines)})\n`);
    for (const owner of entry.owners) {
      sink.write(`${renderOwnerLine(owner, `${indent}  `)}\n`);
    }
  }
};

const escapeCsvField = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

export const renderTable = (
  report: OwnershipReport,
  sink: OutputSink,
  options: RendererOptions = {},
): void => {
  if (options.header === true) {
    sink.write(`${CSV_HEADER.join(",")}\n`);
  }

  // the owner column carries the label and the score is left empty
  if (!report.available) {
    sink.write(`${escapeCsvField(report.rootPath)},${NOT_TRACKED_LABEL},\n`);
    return;
  }

  for (const entry of report.entries) {
    for (const owner of entry.owners) {
      sink.write(`${escapeCsvField(entry.path)},${escapeCsvField(owner.name)},${round4(owner.fraction)}\n`);
    }
  }
};

export const renderJson = (report: OwnershipReport, sink: OutputSink): void => {
  sink.write(`${JSON.stringify(report, null, 2)}\n`);
};

export const createOwnershipRenderer = (
  format: OwnershipRenderer["format"],
  options: RendererOptions = {},
): OwnershipRenderer => {
  switch (format) {
    case "tree":
      return { format, render: renderTree };
    case "csv":
      return { format, render: (report, sink) => renderTable(report, sink, options) };
    case "json":
      return { format, render: renderJson };
  }
};
