import type { PrefixedNamespaceBinding } from "../core/types.js";

/**
 * Namespace state of the ancestors of the element being written, one level
 * per open element. Both stacks always have the same length.
 */
export class NamespaceScopeTracker {
  private readonly declaredBindings: (readonly PrefixedNamespaceBinding[])[] = [];
  private readonly defaultOverrides: (string | undefined)[] = [];

  get depth(): number {
    return this.declaredBindings.length;
  }

  currentDefaultUri(): string {
    for (let i = this.defaultOverrides.length - 1; i >= 0; i -= 1) {
      const uri = this.defaultOverrides[i];
      if (uri !== undefined) {
        return uri;
      }
    }
    return "";
  }

  /**
   * True when the nearest ancestor that declared `prefix` bound it to `uri`.
   * Every level is searched, not just the parent.
   */
  isDeclared(prefix: string, uri: string): boolean {
    for (let i = this.declaredBindings.length - 1; i >= 0; i -= 1) {
      const match = this.declaredBindings[i].find((binding) => binding.prefix === prefix);
      if (match) {
        return match.uri === uri;
      }
    }
    return false;
  }

  enter(declared: readonly PrefixedNamespaceBinding[], defaultOverride: string | undefined): void {
    this.declaredBindings.push(declared);
    this.defaultOverrides.push(defaultOverride);
  }

  exit(): void {
    this.declaredBindings.pop();
    this.defaultOverrides.pop();
  }
}
