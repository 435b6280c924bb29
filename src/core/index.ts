export { align, DEFAULT_PAIRING_THRESHOLD, type AlignOptions } from "./diff/aligner.js";
export { getMatchingBlocks, getOpcodes, similarityRatio, type MatchingBlock, type Opcode, type OpcodeTag } from "./diff/opcodes.js";
export type { ChangeStats, Comparison, DiffRecord, DiffRecordType, Summary } from "./diff/schema.js";
export { summarize } from "./diff/summary.js";
export { ComparisonEngine, type CompareInput } from "./compare.js";
export { loadConfig, type ParadiffConfig } from "./config.js";
export { buildSideView, type Side, type SideSegment } from "./render/sideView.js";
export {
  pdfReportLines,
  renderHtmlReport,
  renderJsonReport,
  renderPdfReport,
  renderReport,
  reportFormatForPath,
  type PdfReportLine,
  type ReportFormat,
} from "./render/report.js";
export { DocumentSourceError, loadDocument, normalizeText, type LoadedDocument } from "./text/documentSource.js";
export { splitParagraphs, splitSentences, countWords } from "./text/segment.js";
