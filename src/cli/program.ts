import { Command } from "commander";
import { ComparisonEngine } from "../core/compare.js";
import type { ParadiffConfig } from "../core/config.js";
import { runCompare } from "./commands/compare.js";
import { startServer } from "./commands/serve.js";

const parsePort = (value: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
};

interface ServeCommandOptions {
  port: string;
  open: boolean;
}

interface CompareCommandOptions extends ServeCommandOptions {
  json?: boolean;
  out?: string;
  serve?: boolean;
}

/* Positional options keep `--port`/`--no-open` after `serve` on the subcommand. */
export const buildProgram = (config: ParadiffConfig, version: string): Command => {
  const program: Command = new Command();
  program
    .name("paradiff")
    .description("Paragraph and sentence level comparison of two text documents")
    .version(version)
    .enablePositionalOptions();

  program
    .command("serve")
    .description("Start the comparison API without an initial comparison")
    .option("--port <port>", "Server port", String(config.port))
    .option("--no-open", "Do not open browser")
    .action(async (options: ServeCommandOptions) => {
      const server = await startServer({
        engine: new ComparisonEngine({ pairingThreshold: config.pairingThreshold }),
        maxInputChars: config.maxInputChars,
        maxStoredComparisons: config.maxStoredComparisons,
        port: parsePort(options.port),
        openBrowser: options.open,
      });
      console.log(`API ready at ${server.url}`);
    });

  program
    .argument("[oldFile]", "First (original) document")
    .argument("[newFile]", "Second (revised) document")
    .option("--json", "Print the comparison as JSON")
    .option("-o, --out <file>", "Write a report; format follows the extension (.html, .json or .pdf)")
    .option("--serve", "Serve the report over HTTP after comparing")
    .option("--no-open", "Do not open browser")
    .option("--port <port>", "Server port", String(config.port))
    .action(async (oldFile: string | undefined, newFile: string | undefined, options: CompareCommandOptions) => {
      if (!oldFile || !newFile) {
        program.error("Use `paradiff <oldFile> <newFile>` or `paradiff serve`.");
      }
      const result = await runCompare({
        oldFile,
        newFile,
        config: { ...config, port: parsePort(options.port) },
        json: options.json,
        out: options.out,
        serve: options.serve,
        openBrowser: options.open,
      });
      if (result.server) {
        console.log(`Report ready at ${result.server.url}`);
      }
    });

  return program;
};
