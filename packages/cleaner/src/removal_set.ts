/**
 * Lowercased set of parameter names a cleaning call strips.
 *
 * Build one up front for hot paths (request middleware, batch jobs) so names
 * are normalized once instead of on every call.
 */
export class RemovalSet {
  private readonly names: ReadonlySet<string>;

  private constructor(names: ReadonlySet<string>) {
    this.names = names;
  }

  static of(names: Iterable<string>): RemovalSet {
    const lowered = new Set<string>();
    for (const name of names) lowered.add(name.toLowerCase());
    return new RemovalSet(lowered);
  }

  static union(...inputs: RemovalInput[]): RemovalSet {
    const merged = new Set<string>();
    for (const input of inputs) {
      for (const name of toRemovalSet(input).names) merged.add(name);
    }
    return new RemovalSet(merged);
  }

  get size(): number {
    return this.names.size;
  }

  /** Case-insensitive membership. */
  has(name: string): boolean {
    return this.names.has(name.toLowerCase());
  }

  values(): IterableIterator<string> {
    return this.names.values();
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this.names.values();
  }
}

/**
 * Anything accepted where a removal set is expected. A bare string is one
 * parameter name, not a sequence of characters.
 */
export type RemovalInput = RemovalSet | Iterable<string> | string;

export function toRemovalSet(input: RemovalInput): RemovalSet {
  if (input instanceof RemovalSet) return input;
  if (typeof input === "string") return RemovalSet.of([input]);
  return RemovalSet.of(input);
}
