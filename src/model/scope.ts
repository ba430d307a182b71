import type {
  EmptyNamespaceBinding,
  NamespaceBinding,
  PrefixedNamespaceBinding,
} from "../core/types.js";

export const EMPTY_SCOPE: EmptyNamespaceBinding = Object.freeze({ kind: "empty" });

export const bindUnprefixed = (
  uri: string,
  parent: NamespaceBinding = EMPTY_SCOPE
): NamespaceBinding => ({ kind: "unprefixed", uri, parent });

export const bindPrefixed = (
  prefix: string,
  uri: string,
  parent: NamespaceBinding = EMPTY_SCOPE
): NamespaceBinding => ({ kind: "prefixed", prefix, uri, parent });

/**
 * Nearest link binding `prefix`. The empty prefix matches the nearest
 * unprefixed link, or the chain terminator when there is none.
 */
export const findByPrefix = (
  scope: NamespaceBinding,
  prefix: string
): NamespaceBinding | undefined => {
  let current = scope;
  while (current.kind !== "empty") {
    if (current.kind === "unprefixed" ? prefix === "" : current.prefix === prefix) {
      return current;
    }
    current = current.parent;
  }
  return prefix === "" ? current : undefined;
};

export const resolveNamespaceUri = (
  scope: NamespaceBinding,
  prefix: string
): string | undefined => {
  const binding = findByPrefix(scope, prefix);
  if (!binding) {
    return undefined;
  }
  return binding.kind === "empty" ? "" : binding.uri;
};

/** Every non-terminator link, outermost first. */
export const scopeToList = (scope: NamespaceBinding): Exclude<NamespaceBinding, EmptyNamespaceBinding>[] => {
  const links: Exclude<NamespaceBinding, EmptyNamespaceBinding>[] = [];
  let current = scope;
  while (current.kind !== "empty") {
    links.push(current);
    current = current.parent;
  }
  return links.reverse();
};

/** Prefixed links still in effect (not shadowed by a nearer link for the same prefix). */
export const effectivePrefixedBindings = (scope: NamespaceBinding): PrefixedNamespaceBinding[] => {
  return scopeToList(scope).filter(
    (link): link is PrefixedNamespaceBinding =>
      link.kind === "prefixed" && findByPrefix(scope, link.prefix) === link
  );
};
