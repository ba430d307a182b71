import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { test } from "vitest";

import { runReserializeCommand } from "../../../../src/cli/commands/reserialize.js";

const SOURCE = `<r xmlns="urn:a"><c xmlns="urn:a"/></r>`;

const makeInput = (content = SOURCE): string => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "xmlns-writer-cli-"));
  const file = path.join(dir, "in.xml");
  fs.writeFileSync(file, content);
  return file;
};

const run = (args: string[]) => {
  const out: Buffer[] = [];
  const err: string[] = [];
  const code = runReserializeCommand(
    args,
    (chunk) => {
      out.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
    },
    (line) => {
      err.push(line);
    }
  );
  const bytes = Buffer.concat(out);
  return { code, bytes, out: bytes.toString("utf8"), err };
};

test("reserialize prints the normalized document", () => {
  const result = run(["--in", makeInput()]);
  assert.equal(result.code, 0);
  assert.equal(result.out, `<r xmlns="urn:a"><c/></r>\n`);
  assert.deepEqual(result.err, []);
});

test("reserialize adds a declaration with the requested encoding", () => {
  const result = run(["--in", makeInput(), "--declaration", "--encoding", "ISO-8859-1"]);
  assert.equal(result.code, 0);
  assert.equal(
    result.out,
    `<?xml version="1.0" encoding="ISO-8859-1" standalone="yes"?><r xmlns="urn:a"><c/></r>\n`
  );
});

test("reserialize encodes stdout with the requested encoding", () => {
  const result = run(["--in", makeInput("<r>é</r>"), "--encoding", "ISO-8859-1"]);
  assert.equal(result.code, 0);
  assert.equal(result.bytes.length, 9);
  assert.equal(result.bytes.toString("latin1"), "<r>é</r>\n");
});

test("reserialize rejects encodings stdout cannot use", () => {
  const unsupported = run(["--in", makeInput(), "--encoding", "EBCDIC"]);
  assert.equal(unsupported.code, 1);
  assert.equal(unsupported.out, "");
  assert.equal(unsupported.err[1], "ERROR_CODE:XML_ENCODING_UNSUPPORTED");

  const unmappable = run(["--in", makeInput("<r>Ā</r>"), "--encoding", "ISO-8859-1"]);
  assert.equal(unmappable.code, 1);
  assert.equal(unmappable.err[1], "ERROR_CODE:XML_ENCODING_UNMAPPABLE");
});

test("reserialize writes to an output file", () => {
  const input = makeInput();
  const output = path.join(path.dirname(input), "out.xml");
  const result = run(["--in", input, "--out", output]);
  assert.equal(result.code, 0);
  assert.equal(result.out, `RESULT:OK\nOUT:${path.resolve(output)}\n`);
  assert.equal(fs.readFileSync(output, "utf8"), `<r xmlns="urn:a"><c/></r>`);
});

test("reserialize reports argument errors", () => {
  assert.deepEqual(run([]).err, [
    "RESULT:ERROR",
    "ERROR_CODE:CLI_ARG_REQUIRED",
    `ERROR_MSG_JSON:"Missing required argument --in"`,
  ]);
  assert.equal(run(["oops"]).err[1], "ERROR_CODE:CLI_ARG_FORMAT");
  assert.equal(run(["--in"]).err[1], "ERROR_CODE:CLI_ARG_MISSING");
  assert.equal(run(["--in", "--out"]).err[1], "ERROR_CODE:CLI_ARG_MISSING");
});

test("reserialize reports input and output failures", () => {
  const missing = path.join(os.tmpdir(), "xmlns-writer-missing", "none.xml");
  const notFound = run(["--in", missing]);
  assert.equal(notFound.code, 1);
  assert.equal(notFound.err[1], "ERROR_CODE:CLI_INPUT_NOT_FOUND");

  assert.equal(run(["--in", makeInput("<r")]).err[1], "ERROR_CODE:XML_PARSE_ERROR");

  const input = makeInput();
  const badEncoding = run([
    "--in",
    input,
    "--out",
    path.join(path.dirname(input), "bad.xml"),
    "--encoding",
    "EBCDIC",
  ]);
  assert.equal(badEncoding.code, 1);
  assert.equal(badEncoding.err[1], "ERROR_CODE:XML_ENCODING_UNSUPPORTED");
});
