#!/usr/bin/env node
import { existsSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import updateNotifier from "update-notifier";
import { loadConfig } from "../core/config.js";
import { DocumentSourceError } from "../core/text/documentSource.js";
import { runInteractiveMenu } from "./interactive.js";
import { buildProgram } from "./program.js";

interface PackageInfo {
  name: string;
  version: string;
}

const readPackageInfo = (): PackageInfo => {
  const here = dirname(fileURLToPath(import.meta.url));
  const pkgPath = [join(here, "../../../package.json"), join(here, "../../package.json")].find((p) => existsSync(p));
  if (!pkgPath) {
    return { name: "paradiff", version: "0.0.0" };
  }
  const parsed: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
  if (
    typeof parsed === "object"
    && parsed !== null
    && "name" in parsed
    && "version" in parsed
    && typeof parsed.name === "string"
    && typeof parsed.version === "string"
  ) {
    return { name: parsed.name, version: parsed.version };
  }
  return { name: "paradiff", version: "0.0.0" };
};

const describeFailure = (error: unknown): string => {
  if (error instanceof DocumentSourceError) return `${error.code}: ${error.message}`;
  return error instanceof Error ? error.message : String(error);
};

const main = async (): Promise<void> => {
  const pkg = readPackageInfo();
  updateNotifier({ pkg }).notify();
  const config = loadConfig();
  if (process.argv.length <= 2) {
    await runInteractiveMenu(config);
    return;
  }
  await buildProgram(config, pkg.version).parseAsync(process.argv);
};

main().catch((error: unknown) => {
  console.error(describeFailure(error));
  process.exitCode = 1;
});
