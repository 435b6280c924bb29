import { PDFDocument, StandardFonts, rgb, type Color, type PDFFont } from "pdf-lib";
import type { Comparison, DiffRecord, DiffRecordType, Summary } from "../diff/schema.js";
import { buildSideView, type Side } from "./sideView.js";

export type ReportFormat = "html" | "json" | "pdf";

export const escapeHtml = (value: string): string =>
  value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");

export const formatPercentage = (value: number): string => `${value.toFixed(1)}%`;

const summaryRows = (summary: Summary): string[] => [
  `<tr class="additions"><th>Additions</th><td>${summary.additions.count}</td><td>${formatPercentage(summary.additions.percentage)}</td><td>${summary.additions.words} words</td></tr>`,
  `<tr class="deletions"><th>Deletions</th><td>${summary.deletions.count}</td><td>${formatPercentage(summary.deletions.percentage)}</td><td>${summary.deletions.words} words</td></tr>`,
  `<tr class="modifications"><th>Modifications</th><td>${summary.modifications.count}</td><td>${formatPercentage(summary.modifications.percentage)}</td><td>${summary.modifications.wordsOld} → ${summary.modifications.wordsNew} words</td></tr>`,
  `<tr class="unchanged"><th>Unchanged</th><td>${summary.unchanged.count}</td><td>${formatPercentage(summary.unchanged.percentage)}</td><td></td></tr>`,
];

const renderSide = (comparison: Comparison, side: Side): string => {
  const title = side === "old" ? comparison.oldName : comparison.newName;
  const paragraphs = buildSideView(comparison.records, side).map((segment) => {
    const classes = segment.placeholder ? "placeholder" : segment.type;
    const id = segment.anchorId ? ` id="${segment.anchorId}"` : "";
    return `<p class="${classes}"${id}>${escapeHtml(segment.text)}</p>`;
  });
  return [`<section class="side side-${side}">`, `<h2>${escapeHtml(title)}</h2>`, ...paragraphs, "</section>"].join("\n");
};

export const renderHtmlReport = (comparison: Comparison): string =>
  [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '<meta charset="UTF-8">',
    `<title>Comparison of ${escapeHtml(comparison.oldName)} and ${escapeHtml(comparison.newName)}</title>`,
    "</head>",
    "<body>",
    "<header>",
    `<h1>${escapeHtml(comparison.oldName)} → ${escapeHtml(comparison.newName)}</h1>`,
    `<p class="meta">Generated ${escapeHtml(comparison.createdAt)}, ${comparison.summary.totalElements} elements compared</p>`,
    "</header>",
    '<table class="summary">',
    ...summaryRows(comparison.summary),
    "</table>",
    '<ul class="legend"><li class="added">Added content</li><li class="deleted">Removed content</li><li class="modified">Modified content</li></ul>',
    '<main class="sides">',
    renderSide(comparison, "old"),
    renderSide(comparison, "new"),
    "</main>",
    "</body>",
    "</html>",
    "",
  ].join("\n");

export const renderJsonReport = (comparison: Comparison): string => `${JSON.stringify(comparison, null, 2)}\n`;

export type PdfLineKind = "title" | "meta" | "heading" | "summary" | DiffRecordType;

export interface PdfReportLine {
  kind: PdfLineKind;
  text: string;
}

export const summarySentence = (summary: Summary): string =>
  `${summary.totalElements} elements: ${summary.additions.count} added, ${summary.deletions.count} deleted, ` +
  `${summary.modifications.count} modified, ${summary.unchanged.count} unchanged`;

const recordText = (record: DiffRecord): string => {
  switch (record.type) {
    case "added":
      return `+ ${record.newContent}`;
    case "deleted":
      return `- ${record.oldContent}`;
    case "modified":
      return `~ ${record.oldContent} -> ${record.newContent}`;
    case "equal":
      return `= ${record.oldContent}`;
  }
};

export const pdfReportLines = (comparison: Comparison): PdfReportLine[] => {
  const { summary } = comparison;
  return [
    { kind: "title", text: `${comparison.oldName} -> ${comparison.newName}` },
    { kind: "meta", text: `Generated ${comparison.createdAt}, ${summary.totalElements} elements compared` },
    { kind: "heading", text: "Summary" },
    { kind: "summary", text: `Additions: ${summary.additions.count} (${formatPercentage(summary.additions.percentage)}), ${summary.additions.words} words` },
    { kind: "summary", text: `Deletions: ${summary.deletions.count} (${formatPercentage(summary.deletions.percentage)}), ${summary.deletions.words} words` },
    {
      kind: "summary",
      text: `Modifications: ${summary.modifications.count} (${formatPercentage(summary.modifications.percentage)}), ${summary.modifications.wordsOld} -> ${summary.modifications.wordsNew} words`,
    },
    { kind: "summary", text: `Unchanged: ${summary.unchanged.count} (${formatPercentage(summary.unchanged.percentage)})` },
    { kind: "heading", text: "Changes" },
    ...comparison.records.map((record): PdfReportLine => ({ kind: record.type, text: recordText(record) })),
  ];
};

interface PdfLineStyle {
  size: number;
  lineHeight: number;
  gapAfter: number;
  bold: boolean;
  color: Color;
}

const PDF_STYLES: Record<PdfLineKind, PdfLineStyle> = {
  title: { size: 16, lineHeight: 21, gapAfter: 4, bold: true, color: rgb(0, 0, 0) },
  meta: { size: 9, lineHeight: 12, gapAfter: 10, bold: false, color: rgb(0.4, 0.4, 0.4) },
  heading: { size: 13, lineHeight: 18, gapAfter: 6, bold: true, color: rgb(0, 0, 0) },
  summary: { size: 11, lineHeight: 15, gapAfter: 1, bold: false, color: rgb(0, 0, 0) },
  added: { size: 10, lineHeight: 14, gapAfter: 4, bold: false, color: rgb(0.1, 0.5, 0.1) },
  deleted: { size: 10, lineHeight: 14, gapAfter: 4, bold: false, color: rgb(0.7, 0.1, 0.1) },
  modified: { size: 10, lineHeight: 14, gapAfter: 4, bold: false, color: rgb(0.7, 0.45, 0) },
  equal: { size: 10, lineHeight: 14, gapAfter: 4, bold: false, color: rgb(0.2, 0.2, 0.2) },
};

const PAGE_SIZE: [number, number] = [612, 792];
const MARGIN_X = 48;
const TOP_Y = PAGE_SIZE[1] - 56;
const BOTTOM_Y = 48;

const WIN_ANSI_SUBSTITUTES: Record<string, string> = {
  "\u2192": "->",
  "\u2026": "...",
};

/* The standard fonts only encode WinAnsi; anything else is substituted or shown as "?". */
const toWinAnsi = (text: string): string =>
  text
    .replace(/\s+/g, " ")
    .replace(/[\u2192\u2026]/g, (char) => WIN_ANSI_SUBSTITUTES[char] ?? "?")
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/[\u201c\u201d]/g, '"')
    .replace(/[\u2013\u2014]/g, "-")
    .replace(/[^\x20-\x7e\u00a1-\u00ff]/g, "?")
    .trim();

const wrapTextToWidth = (text: string, font: PDFFont, size: number, maxWidth: number): string[] => {
  const rows: string[] = [];
  let current = "";
  for (const word of text.split(" ")) {
    const candidate = current ? `${current} ${word}` : word;
    if (font.widthOfTextAtSize(candidate, size) <= maxWidth) {
      current = candidate;
    } else {
      if (current) rows.push(current);
      current = word;
    }
  }
  if (current) rows.push(current);
  return rows;
};

export const renderPdfReport = async (comparison: Comparison): Promise<Uint8Array> => {
  const pdfDoc = await PDFDocument.create();
  pdfDoc.setTitle(`Comparison of ${comparison.oldName} and ${comparison.newName}`);
  pdfDoc.setSubject(summarySentence(comparison.summary));
  pdfDoc.setCreator("paradiff");

  const bodyFont = await pdfDoc.embedFont(StandardFonts.Helvetica);
  const boldFont = await pdfDoc.embedFont(StandardFonts.HelveticaBold);
  const maxWidth = PAGE_SIZE[0] - MARGIN_X * 2;

  let page = pdfDoc.addPage(PAGE_SIZE);
  let y = TOP_Y;
  for (const line of pdfReportLines(comparison)) {
    const style = PDF_STYLES[line.kind];
    const font = style.bold ? boldFont : bodyFont;
    for (const row of wrapTextToWidth(toWinAnsi(line.text), font, style.size, maxWidth)) {
      if (y < BOTTOM_Y + style.lineHeight) {
        page = pdfDoc.addPage(PAGE_SIZE);
        y = TOP_Y;
      }
      page.drawText(row, { x: MARGIN_X, y, size: style.size, font, color: style.color });
      y -= style.lineHeight;
    }
    y -= style.gapAfter;
  }

  return pdfDoc.save();
};

export const renderReport = async (comparison: Comparison, format: ReportFormat): Promise<string | Uint8Array> => {
  switch (format) {
    case "html":
      return renderHtmlReport(comparison);
    case "json":
      return renderJsonReport(comparison);
    case "pdf":
      return renderPdfReport(comparison);
  }
};

export const reportFormatForPath = (path: string): ReportFormat | null => {
  const lower = path.toLowerCase();
  if (lower.endsWith(".html") || lower.endsWith(".htm")) return "html";
  if (lower.endsWith(".json")) return "json";
  if (lower.endsWith(".pdf")) return "pdf";
  return null;
};
