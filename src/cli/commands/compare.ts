import { writeFile } from "node:fs/promises";
import { ComparisonEngine } from "../../core/compare.js";
import type { ParadiffConfig } from "../../core/config.js";
import type { Comparison, Summary } from "../../core/diff/schema.js";
import { formatPercentage, renderJsonReport, renderReport, reportFormatForPath } from "../../core/render/report.js";
import { loadDocument } from "../../core/text/documentSource.js";
import { startServer, type RunningServer } from "./serve.js";

export interface RunCompareOptions {
  oldFile: string;
  newFile: string;
  config: ParadiffConfig;
  json?: boolean;
  out?: string;
  serve?: boolean;
  openBrowser?: boolean;
}

export interface RunCompareResult {
  comparison: Comparison;
  server?: RunningServer;
}

export const formatSummary = (summary: Summary): string[] => [
  `Additions:     ${summary.additions.count} (${formatPercentage(summary.additions.percentage)}), ${summary.additions.words} words`,
  `Deletions:     ${summary.deletions.count} (${formatPercentage(summary.deletions.percentage)}), ${summary.deletions.words} words`,
  `Modifications: ${summary.modifications.count} (${formatPercentage(summary.modifications.percentage)}), ${summary.modifications.wordsOld} -> ${summary.modifications.wordsNew} words`,
  `Unchanged:     ${summary.unchanged.count} (${formatPercentage(summary.unchanged.percentage)})`,
];

export const runCompare = async (options: RunCompareOptions): Promise<RunCompareResult> => {
  const { config } = options;
  const [oldDoc, newDoc] = await Promise.all([
    loadDocument(options.oldFile, config.maxInputChars),
    loadDocument(options.newFile, config.maxInputChars),
  ]);

  const engine = new ComparisonEngine({ pairingThreshold: config.pairingThreshold });
  const comparison = engine.run({
    oldName: oldDoc.name,
    newName: newDoc.name,
    oldText: oldDoc.text,
    newText: newDoc.text,
  });

  if (options.json) {
    process.stdout.write(renderJsonReport(comparison));
  } else {
    console.log(`Compared ${comparison.oldName} with ${comparison.newName}: ${comparison.summary.totalElements} elements`);
    for (const line of formatSummary(comparison.summary)) {
      console.log(line);
    }
  }

  if (options.out) {
    const format = reportFormatForPath(options.out);
    if (!format) {
      throw new Error(`Cannot infer report format from ${options.out}; use a .html, .json or .pdf file name`);
    }
    await writeFile(options.out, await renderReport(comparison, format));
    if (!options.json) {
      console.log(`Report written to ${options.out}`);
    }
  }

  if (!options.serve) {
    return { comparison };
  }

  const server = await startServer({
    engine,
    maxInputChars: config.maxInputChars,
    maxStoredComparisons: config.maxStoredComparisons,
    port: config.port,
    openBrowser: options.openBrowser ?? false,
    comparisons: [comparison],
  });
  return { comparison, server };
};
