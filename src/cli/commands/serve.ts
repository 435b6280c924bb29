import { createServer, type Server } from "node:http";
import open from "open";
import type { ComparisonEngine } from "../../core/compare.js";
import type { Comparison } from "../../core/diff/schema.js";
import { createApp } from "../../server/app.js";
import { ComparisonStore } from "../../server/comparisonStore.js";

const PORT_ATTEMPTS = 20;

export interface ServeOptions {
  engine: ComparisonEngine;
  maxInputChars: number;
  maxStoredComparisons: number;
  /** 0 lets the OS pick a port. */
  port: number;
  openBrowser: boolean;
  comparisons?: Comparison[];
}

export interface RunningServer {
  url: string;
  port: number;
  comparisons: ComparisonStore;
  close: () => Promise<void>;
}

const isAddressInUse = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "EADDRINUSE";

const listenOn = (server: Server, port: number): Promise<number> =>
  new Promise((resolveListen, rejectListen) => {
    const onError = (error: Error): void => {
      server.off("listening", onListening);
      rejectListen(error);
    };
    const onListening = (): void => {
      server.off("error", onError);
      const address = server.address();
      resolveListen(typeof address === "object" && address !== null ? address.port : port);
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port);
  });

/* Binds directly and moves to the next port only when the bind itself fails. */
const listenFrom = async (server: Server, preferredPort: number): Promise<number> => {
  const attempts = preferredPort === 0 ? 1 : PORT_ATTEMPTS;
  let lastError: unknown;
  for (let offset = 0; offset < attempts; offset += 1) {
    try {
      return await listenOn(server, preferredPort + offset);
    } catch (error) {
      if (!isAddressInUse(error)) throw error;
      lastError = error;
    }
  }
  throw new Error(`No free port found in range ${preferredPort}-${preferredPort + attempts - 1}`, { cause: lastError });
};

export const startServer = async (options: ServeOptions): Promise<RunningServer> => {
  const comparisons = new ComparisonStore(options.maxStoredComparisons);
  for (const comparison of options.comparisons ?? []) {
    comparisons.add(comparison);
  }
  const server = createServer(createApp({ engine: options.engine, comparisons, maxInputChars: options.maxInputChars }));
  const port = await listenFrom(server, options.port);
  if (options.port !== 0 && port !== options.port) {
    console.log(`Port ${options.port} busy, using ${port}`);
  }

  const [first] = comparisons.list();
  const url = first
    ? `http://localhost:${port}/api/comparisons/${first.id}/report.html`
    : `http://localhost:${port}/`;
  if (options.openBrowser) {
    await open(url);
  }

  return {
    url,
    port,
    comparisons,
    close: () =>
      new Promise<void>((resolveClose, rejectClose) => {
        server.close((error) => (error ? rejectClose(error) : resolveClose()));
      }),
  };
};
