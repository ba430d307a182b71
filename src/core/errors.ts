export class XmlWriterError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "XmlWriterError";
    this.code = code;
  }
}
