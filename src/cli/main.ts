#!/usr/bin/env node

import path from "node:path";
import { fileURLToPath } from "node:url";

import { runReserializeCommand } from "./commands/reserialize.js";

const usage = [
  "xmlns-writer",
  "  reserialize --in <path> [--out <path>] [--encoding <name>] [--declaration]",
].join("\n");

export const runXmlnsWriterCli = async (argv: string[]): Promise<number> => {
  const [mode, ...rest] = argv;
  if (!mode || mode === "--help" || mode === "-h") {
    process.stdout.write(`${usage}\n`);
    return 0;
  }
  if (mode === "reserialize") {
    return runReserializeCommand(rest);
  }
  process.stderr.write(`Unknown mode: ${mode}\n${usage}\n`);
  return 1;
};

const currentPath = fileURLToPath(import.meta.url);
const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

/* v8 ignore next 11 */
if (entryPath && currentPath === entryPath) {
  runXmlnsWriterCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : "Unknown CLI crash.";
      process.stderr.write(`${message}\n`);
      process.exitCode = 1;
    });
}
