import express from "express";
import type { ComparisonEngine } from "../core/compare.js";
import { buildSideView, isSide } from "../core/render/sideView.js";
import { escapeHtml, renderHtmlReport, renderPdfReport } from "../core/render/report.js";
import { DocumentSourceError, assertWithinLimit, normalizeText } from "../core/text/documentSource.js";
import type { ComparisonStore } from "./comparisonStore.js";

export interface AppContext {
  engine: ComparisonEngine;
  comparisons: ComparisonStore;
  maxInputChars: number;
}

interface ComparisonRequestBody {
  oldText: string;
  newText: string;
  oldName?: string;
  newName?: string;
}

const isComparisonRequestBody = (value: unknown): value is ComparisonRequestBody => {
  if (typeof value !== "object" || value === null) return false;
  if (!("oldText" in value) || !("newText" in value)) return false;
  const oldName = "oldName" in value ? value.oldName : undefined;
  const newName = "newName" in value ? value.newName : undefined;
  return (
    typeof value.oldText === "string"
    && typeof value.newText === "string"
    && (oldName === undefined || typeof oldName === "string")
    && (newName === undefined || typeof newName === "string")
  );
};

export const createApp = (context: AppContext): express.Express => {
  const app = express();
  app.use(express.json({ limit: "10mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post("/api/comparisons", (req, res) => {
    const body: unknown = req.body;
    if (!isComparisonRequestBody(body)) {
      res.status(400).json({ error: "oldText and newText must be strings" });
      return;
    }

    const oldName = body.oldName ?? "old";
    const newName = body.newName ?? "new";
    const oldText = normalizeText(body.oldText);
    const newText = normalizeText(body.newText);
    try {
      assertWithinLimit(oldText, oldName, context.maxInputChars);
      assertWithinLimit(newText, newName, context.maxInputChars);
    } catch (error) {
      if (error instanceof DocumentSourceError) {
        res.status(400).json({ error: error.message, code: error.code });
        return;
      }
      throw error;
    }

    const comparison = context.engine.run({ oldName, newName, oldText, newText });
    context.comparisons.add(comparison);
    res.status(201).json(comparison);
  });

  app.get("/api/comparisons/:id", (req, res) => {
    const comparison = context.comparisons.get(req.params.id);
    if (!comparison) {
      res.status(404).json({ error: "comparison not found" });
      return;
    }
    res.json(comparison);
  });

  app.delete("/api/comparisons/:id", (req, res) => {
    if (!context.comparisons.delete(req.params.id)) {
      res.status(404).json({ error: "comparison not found" });
      return;
    }
    res.status(204).end();
  });

  app.get("/api/comparisons/:id/summary", (req, res) => {
    const comparison = context.comparisons.get(req.params.id);
    if (!comparison) {
      res.status(404).json({ error: "comparison not found" });
      return;
    }
    res.json(comparison.summary);
  });

  app.get("/api/comparisons/:id/side/:side", (req, res) => {
    const comparison = context.comparisons.get(req.params.id);
    if (!comparison) {
      res.status(404).json({ error: "comparison not found" });
      return;
    }
    const side = req.params.side;
    if (!isSide(side)) {
      res.status(404).json({ error: "side not found" });
      return;
    }
    res.json(buildSideView(comparison.records, side));
  });

  app.get("/api/comparisons/:id/report.html", (req, res) => {
    const comparison = context.comparisons.get(req.params.id);
    if (!comparison) {
      res.status(404).json({ error: "comparison not found" });
      return;
    }
    res.type("text/html").send(renderHtmlReport(comparison));
  });

  app.get("/api/comparisons/:id/report.pdf", (req, res, next) => {
    const comparison = context.comparisons.get(req.params.id);
    if (!comparison) {
      res.status(404).json({ error: "comparison not found" });
      return;
    }
    renderPdfReport(comparison)
      .then((bytes) => {
        res.type("application/pdf").send(Buffer.from(bytes));
      })
      .catch(next);
  });

  app.get("/", (_req, res) => {
    const links = context.comparisons.list().map(
      (comparison) => `<li><a href="/api/comparisons/${comparison.id}/report.html">${escapeHtml(comparison.oldName)} → ${escapeHtml(comparison.newName)}</a></li>`,
    );
    res.type("text/html").send(`<h1>paradiff</h1><ul>${links.join("")}</ul>`);
  });

  return app;
};
