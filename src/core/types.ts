export interface EmptyNamespaceBinding {
  readonly kind: "empty";
}

export interface UnprefixedNamespaceBinding {
  readonly kind: "unprefixed";
  readonly uri: string;
  readonly parent: NamespaceBinding;
}

export interface PrefixedNamespaceBinding {
  readonly kind: "prefixed";
  readonly prefix: string;
  readonly uri: string;
  readonly parent: NamespaceBinding;
}

/**
 * One link of an immutable scope chain. Children share their parent's links,
 * so the innermost link is always the head.
 */
export type NamespaceBinding =
  | EmptyNamespaceBinding
  | UnprefixedNamespaceBinding
  | PrefixedNamespaceBinding;

export interface XmlAttribute {
  readonly prefix?: string;
  readonly name: string;
  readonly value: string;
}

export interface XmlElement {
  readonly kind: "element";
  readonly prefix?: string;
  readonly name: string;
  readonly attributes: readonly XmlAttribute[];
  readonly scope: NamespaceBinding;
  readonly children: readonly XmlNode[];
}

export interface XmlText {
  readonly kind: "text";
  readonly value: string;
}

export interface XmlCData {
  readonly kind: "cdata";
  readonly value: string;
}

export interface XmlComment {
  readonly kind: "comment";
  readonly value: string;
}

export interface XmlProcessingInstruction {
  readonly kind: "processingInstruction";
  readonly target: string;
  readonly data: string;
}

export interface XmlEntityRef {
  readonly kind: "entityRef";
  readonly name: string;
}

export type XmlLeafNode =
  | XmlText
  | XmlCData
  | XmlComment
  | XmlProcessingInstruction
  | XmlEntityRef;

export type XmlNode = XmlElement | XmlLeafNode;

export interface XmlDocument {
  root: XmlElement;
}

/** Append-only text destination. Errors thrown by `append` abort serialization. */
export interface XmlSink {
  append(text: string): void;
}

export interface ByteSink {
  write(chunk: Uint8Array): unknown;
}
