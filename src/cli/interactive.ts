import { access } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import type { ParadiffConfig } from "../core/config.js";
import { runCompare } from "./commands/compare.js";

const EXIT_ANSWERS = new Set(["q", "quit", "exit", "\u001b"]);

export const wantsExit = (answer: string): boolean => EXIT_ANSWERS.has(answer.trim().toLowerCase());

const fileExists = async (path: string): Promise<boolean> => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

const askForFile = async (
  question: string,
  ask: (questionText: string) => Promise<string>,
): Promise<string | "exit"> => {
  while (true) {
    const value = await ask(question);
    if (wantsExit(value)) return "exit";
    if (value.length > 0 && (await fileExists(value))) {
      return value;
    }
    console.log(`File not found: ${value || "(empty)"}. Enter a path, or q to quit.`);
  }
};

export const runInteractiveMenu = async (config: ParadiffConfig): Promise<void> => {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  const ask = async (question: string): Promise<string> => (await rl.question(question)).trim();

  try {
    console.log("\nparadiff (q to quit)");
    const oldFile = await askForFile("First document: ", ask);
    if (oldFile === "exit") return;
    const newFile = await askForFile("Second document: ", ask);
    if (newFile === "exit") return;
    const serveAnswer = await ask("Open the report in a browser? [y/N]: ");
    const serve = serveAnswer.toLowerCase() === "y";

    const result = await runCompare({ oldFile, newFile, config, serve, openBrowser: serve });
    if (result.server) {
      console.log(`Report ready at ${result.server.url}`);
    }
  } finally {
    rl.close();
  }
};
