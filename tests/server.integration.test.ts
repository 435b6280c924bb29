import { PDFDocument } from "pdf-lib";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { startServer, type RunningServer } from "../src/cli/commands/serve.js";
import { ComparisonEngine } from "../src/core/compare.js";
import type { Comparison, Summary } from "../src/core/diff/schema.js";
import type { SideSegment } from "../src/core/render/sideView.js";

describe("comparison api", () => {
  let server: RunningServer;
  let apiBase = "";

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    server = await startServer({
      engine: new ComparisonEngine(),
      maxInputChars: 1000,
      maxStoredComparisons: 3,
      port: 0,
      openBrowser: false,
    });
    apiBase = new URL(server.url).origin;
  });

  afterAll(async () => {
    await server.close();
    vi.restoreAllMocks();
  });

  const postComparison = (body: unknown): Promise<Response> =>
    fetch(`${apiBase}/api/comparisons`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });

  it("reports health", async () => {
    const response = await fetch(`${apiBase}/api/health`);
    expect(await response.json()).toEqual({ ok: true });
  });

  it("creates a comparison and serves its parts", async () => {
    const created = await postComparison({
      oldName: "a.txt",
      newName: "b.txt",
      oldText: "The cat sat.\n\nDogs bark loudly.",
      newText: "The cat sat.\n\nDogs howl loudly. New paragraph here.",
    });
    expect(created.status).toBe(201);
    const comparison = (await created.json()) as Comparison;
    expect(comparison.records).toHaveLength(3);
    expect(server.comparisons.has(comparison.id)).toBe(true);

    const summaryResponse = await fetch(`${apiBase}/api/comparisons/${comparison.id}/summary`);
    const summary = (await summaryResponse.json()) as Summary;
    expect(summary.totalElements).toBe(3);
    expect(summary.modifications.count).toBe(1);

    const sideResponse = await fetch(`${apiBase}/api/comparisons/${comparison.id}/side/old`);
    const segments = (await sideResponse.json()) as SideSegment[];
    expect(segments.map((segment) => segment.text)).toEqual([
      "The cat sat.",
      "Dogs bark loudly.",
      "[Content only in second document]",
    ]);

    const reportResponse = await fetch(`${apiBase}/api/comparisons/${comparison.id}/report.html`);
    expect(reportResponse.headers.get("content-type")).toContain("text/html");
    expect((await reportResponse.text()).startsWith("<!DOCTYPE html>")).toBe(true);
  });

  it("normalizes submitted text and names sides by default", async () => {
    const created = await postComparison({ oldText: "One\nline.", newText: "One line." });
    const comparison = (await created.json()) as Comparison;
    expect(comparison.oldName).toBe("old");
    expect(comparison.newName).toBe("new");
    expect(comparison.records).toEqual([{ type: "equal", oldContent: "One line.", newContent: "One line." }]);
  });

  it("rejects malformed and oversized bodies", async () => {
    const malformed = await postComparison({ oldText: 1, newText: "x" });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ error: "oldText and newText must be strings" });

    const oversized = await postComparison({ oldText: "x".repeat(2000), newText: "y" });
    expect(oversized.status).toBe(400);
    expect(await oversized.json()).toEqual({
      error: "old has 2000 characters, more than the limit of 1000",
      code: "too-large",
    });
  });

  it("returns 404 for unknown comparisons and sides", async () => {
    const missing = await fetch(`${apiBase}/api/comparisons/nope`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "comparison not found" });

    const created = await postComparison({ oldText: "A.", newText: "B." });
    const { id } = (await created.json()) as Comparison;
    const badSide = await fetch(`${apiBase}/api/comparisons/${id}/side/left`);
    expect(badSide.status).toBe(404);
    expect(await badSide.json()).toEqual({ error: "side not found" });
  });

  it("serves a PDF report", async () => {
    const created = await postComparison({ oldName: "a.txt", newName: "b.txt", oldText: "Keep.\n\nDrop.", newText: "Keep." });
    const { id } = (await created.json()) as Comparison;

    const response = await fetch(`${apiBase}/api/comparisons/${id}/report.pdf`);
    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("application/pdf");
    const doc = await PDFDocument.load(new Uint8Array(await response.arrayBuffer()));
    expect(doc.getSubject()).toBe("2 elements: 0 added, 1 deleted, 0 modified, 1 unchanged");
  });

  it("deletes comparisons", async () => {
    const created = await postComparison({ oldText: "Delete me.", newText: "Deleted." });
    const { id } = (await created.json()) as Comparison;

    const removed = await fetch(`${apiBase}/api/comparisons/${id}`, { method: "DELETE" });
    expect(removed.status).toBe(204);
    expect(server.comparisons.has(id)).toBe(false);

    const again = await fetch(`${apiBase}/api/comparisons/${id}`, { method: "DELETE" });
    expect(again.status).toBe(404);
    expect(await again.json()).toEqual({ error: "comparison not found" });
  });

  it("keeps only the newest comparisons", async () => {
    const ids: string[] = [];
    for (const text of ["First.", "Second.", "Third.", "Fourth."]) {
      const created = await postComparison({ oldText: text, newText: `${text} More.` });
      ids.push(((await created.json()) as Comparison).id);
    }

    expect(server.comparisons.size).toBe(3);
    const evicted = await fetch(`${apiBase}/api/comparisons/${ids[0]}`);
    expect(evicted.status).toBe(404);
    const kept = await fetch(`${apiBase}/api/comparisons/${ids[3]}`);
    expect(kept.status).toBe(200);
  });
});

describe("startServer", () => {
  it("moves to the next port when the preferred one is taken", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const options = { engine: new ComparisonEngine(), maxInputChars: 1000, maxStoredComparisons: 1, openBrowser: false };
    const first = await startServer({ ...options, port: 0 });
    try {
      const second = await startServer({ ...options, port: first.port });
      try {
        expect(second.port).toBeGreaterThan(first.port);
        expect(second.url).toBe(`http://localhost:${second.port}/`);
        expect(log).toHaveBeenCalledWith(`Port ${first.port} busy, using ${second.port}`);
      } finally {
        await second.close();
      }
    } finally {
      await first.close();
      log.mockRestore();
    }
  });
});
