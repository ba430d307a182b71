import fs from "node:fs";

import { XmlWriterError } from "../core/errors.js";
import type { ByteSink, XmlElement, XmlSink } from "../core/types.js";
import { serialize } from "./serializer.js";
import { EncodingSink, StringSink, createStreamSink } from "./sinks.js";

export const DEFAULT_ENCODING = "UTF-8";

export interface SerializeDocumentOptions {
  encoding?: string;
  emitDeclaration?: boolean;
}

export type XmlDestination =
  | { kind: "sink"; sink: XmlSink }
  | { kind: "stream"; stream: ByteSink }
  | { kind: "file"; path: string };

const BUFFER_ENCODINGS: Record<string, BufferEncoding> = {
  "utf-8": "utf8",
  utf8: "utf8",
  "utf-16le": "utf16le",
  utf16le: "utf16le",
  "iso-8859-1": "latin1",
  latin1: "latin1",
  "us-ascii": "ascii",
  ascii: "ascii",
};

export const resolveBufferEncoding = (encoding: string): BufferEncoding => {
  const resolved = BUFFER_ENCODINGS[encoding.toLowerCase()];
  if (!resolved) {
    throw new XmlWriterError(
      "XML_ENCODING_UNSUPPORTED",
      `Unsupported output encoding: ${encoding}`
    );
  }
  return resolved;
};

export const xmlDeclaration = (encoding: string): string =>
  `<?xml version="1.0" encoding="${encoding}" standalone="yes"?>`;

const writeDocument = (
  root: XmlElement,
  sink: XmlSink,
  encoding: string,
  emitDeclaration: boolean
): void => {
  if (emitDeclaration) {
    sink.append(xmlDeclaration(encoding));
  }
  serialize(root, sink);
};

/**
 * Writes `root` to `destination`, preceded by an XML declaration when
 * `emitDeclaration` is set. Text sinks receive characters as-is; it is up to
 * the caller to encode them consistently with `encoding`.
 */
export const serializeDocument = (
  root: XmlElement,
  destination: XmlDestination,
  options: SerializeDocumentOptions = {}
): void => {
  const encoding = options.encoding ?? DEFAULT_ENCODING;
  const emitDeclaration = options.emitDeclaration ?? false;

  switch (destination.kind) {
    case "sink":
      writeDocument(root, destination.sink, encoding, emitDeclaration);
      return;
    case "stream": {
      const sink = createStreamSink(destination.stream, resolveBufferEncoding(encoding));
      writeDocument(root, sink, encoding, emitDeclaration);
      sink.flush();
      return;
    }
    case "file": {
      const bufferEncoding = resolveBufferEncoding(encoding);
      const fd = fs.openSync(destination.path, "w");
      try {
        const sink = new EncodingSink((chunk) => {
          fs.writeFileSync(fd, chunk);
        }, bufferEncoding);
        writeDocument(root, sink, encoding, emitDeclaration);
        sink.flush();
      } finally {
        fs.closeSync(fd);
      }
      return;
    }
  }
};

export const serializeToString = (
  root: XmlElement,
  options: SerializeDocumentOptions = {}
): string => {
  const sink = new StringSink();
  serializeDocument(root, { kind: "sink", sink }, options);
  return sink.toString();
};
