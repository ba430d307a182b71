import fs from "node:fs";
import path from "node:path";

import { XmlWriterError } from "../../core/errors.js";
import { parseXmlDocument } from "../../parser/xml.js";
import {
  DEFAULT_ENCODING,
  resolveBufferEncoding,
  serializeDocument,
} from "../../serializer/document.js";

type WriteLine = (line: string) => void;
type WriteOut = (chunk: string | Uint8Array) => void;

const BOOLEAN_FLAGS = new Set(["declaration"]);

const parseFlags = (args: string[]): Record<string, string> => {
  const flags: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith("--")) {
      throw new XmlWriterError("CLI_ARG_FORMAT", `Unexpected argument: ${token}`);
    }
    const name = token.slice(2);
    if (BOOLEAN_FLAGS.has(name)) {
      flags[name] = "true";
      continue;
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new XmlWriterError("CLI_ARG_MISSING", `Missing value for --${name}`);
    }
    flags[name] = value;
    i += 1;
  }
  return flags;
};

const getRequiredFlag = (flags: Record<string, string>, name: string): string => {
  const value = flags[name];
  if (value === undefined) {
    throw new XmlWriterError("CLI_ARG_REQUIRED", `Missing required argument --${name}`);
  }
  return value;
};

const readSource = (inputPath: string): string => {
  const resolved = path.resolve(inputPath);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
    throw new XmlWriterError("CLI_INPUT_NOT_FOUND", `Input file does not exist: ${resolved}`);
  }
  return fs.readFileSync(resolved, "utf8");
};

const emitError = (writeLine: WriteLine, error: unknown): number => {
  const code = error instanceof XmlWriterError ? error.code : "CLI_ERROR";
  const message = error instanceof Error ? error.message : "Unknown CLI error.";
  writeLine("RESULT:ERROR");
  writeLine(`ERROR_CODE:${code}`);
  writeLine(`ERROR_MSG_JSON:${JSON.stringify(message)}`);
  return 1;
};

export const runReserializeCommand = (
  args: string[],
  writeOut: WriteOut = (chunk) => {
    process.stdout.write(chunk);
  },
  writeErr: WriteLine = (line) => {
    process.stderr.write(`${line}\n`);
  }
): number => {
  try {
    const flags = parseFlags(args);
    const { root } = parseXmlDocument(readSource(getRequiredFlag(flags, "in")));
    const options = {
      encoding: flags.encoding ?? DEFAULT_ENCODING,
      emitDeclaration: flags.declaration === "true",
    };
    const outPath = flags.out;
    if (outPath === undefined) {
      serializeDocument(root, { kind: "stream", stream: { write: writeOut } }, options);
      writeOut(Buffer.from("\n", resolveBufferEncoding(options.encoding)));
      return 0;
    }
    serializeDocument(root, { kind: "file", path: path.resolve(outPath) }, options);
    writeOut(`RESULT:OK\nOUT:${path.resolve(outPath)}\n`);
    return 0;
  } catch (error) {
    return emitError(writeErr, error);
  }
};
