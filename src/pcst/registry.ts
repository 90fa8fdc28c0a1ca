import type { ExternalId } from "./ids.js";

/**
 * IdentifierRegistry
 *
 * Interns canonical identifiers into dense indices 0..N-1, assigned in
 * first-seen order. Interning the same identifier twice returns the same
 * index. Once sealed the registry is read-only.
 */
export class IdentifierRegistry {
  private readonly idToIndex = new Map<ExternalId, number>();
  private readonly indexToId: ExternalId[] = [];
  private sealed = false;

  intern(id: ExternalId): number {
    const existing = this.idToIndex.get(id);
    if (existing !== undefined) {
      return existing;
    }
    if (this.sealed) {
      throw new Error(`Cannot intern "${id}": registry is sealed`);
    }
    const index = this.indexToId.length;
    this.idToIndex.set(id, index);
    this.indexToId.push(id);
    return index;
  }

  lookup(id: ExternalId): number | undefined {
    return this.idToIndex.get(id);
  }

  /**
   * Reverse lookup. Callers validate the index first; an out-of-range
   * index here is a programming error.
   */
  resolve(index: number): ExternalId {
    const id = this.indexToId[index];
    if (id === undefined) {
      throw new RangeError(
        `Index ${index} is outside the registry (size ${this.indexToId.length})`,
      );
    }
    return id;
  }

  get size(): number {
    return this.indexToId.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  seal(): void {
    this.sealed = true;
  }

  entries(): ReadonlyArray<ExternalId> {
    return this.indexToId;
  }
}
