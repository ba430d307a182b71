import { XmlWriterError } from "../core/errors.js";
import type { ByteSink, XmlSink } from "../core/types.js";

export class StringSink implements XmlSink {
  private readonly chunks: string[] = [];

  append(text: string): void {
    this.chunks.push(text);
  }

  toString(): string {
    return this.chunks.join("");
  }
}

const DEFAULT_HIGH_WATER_MARK = 16 * 1024;

const UNMAPPABLE: Partial<Record<BufferEncoding, RegExp>> = {
  latin1: /[^\u0000-\u00ff]/u,
  ascii: /[^\u0000-\u007f]/u,
};

const assertMappable = (text: string, encoding: BufferEncoding): void => {
  const match = UNMAPPABLE[encoding]?.exec(text);
  if (!match) {
    return;
  }
  const codePoint = (match[0].codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, "0");
  throw new XmlWriterError(
    "XML_ENCODING_UNMAPPABLE",
    `Character U+${codePoint} cannot be written as ${encoding}`
  );
};

/**
 * Encodes appended text and hands it to `write` in chunks of roughly
 * `highWaterMark` characters. Callers must `flush` once done. Text holding a
 * character the encoding cannot represent is rejected before it is buffered.
 */
export class EncodingSink implements XmlSink {
  private pending: string[] = [];
  private pendingLength = 0;

  constructor(
    private readonly write: (chunk: Buffer) => void,
    private readonly encoding: BufferEncoding,
    private readonly highWaterMark = DEFAULT_HIGH_WATER_MARK
  ) {}

  append(text: string): void {
    assertMappable(text, this.encoding);
    this.pending.push(text);
    this.pendingLength += text.length;
    if (this.pendingLength >= this.highWaterMark) {
      this.flush();
    }
  }

  flush(): void {
    if (this.pendingLength === 0) {
      return;
    }
    const text = this.pending.join("");
    this.pending = [];
    this.pendingLength = 0;
    this.write(Buffer.from(text, this.encoding));
  }
}

export const createStreamSink = (
  stream: ByteSink,
  encoding: BufferEncoding,
  highWaterMark?: number
): EncodingSink => {
  return new EncodingSink((chunk) => {
    stream.write(chunk);
  }, encoding, highWaterMark);
};
