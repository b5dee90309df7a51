/**
 * Deduplicated set of identifiers gathered for one resolution pass.
 * Empty strings are never collected.
 */
export class IdentifierCollector {
  private readonly ids = new Set<string>();

  add(id: string | null | undefined): void {
    if (id) {
      this.ids.add(id);
    }
  }

  addAll(ids: Iterable<string | null | undefined>): void {
    for (const id of ids) {
      this.add(id);
    }
  }

  get size(): number {
    return this.ids.size;
  }

  /** Identifiers in first-seen order */
  toArray(): string[] {
    return [...this.ids];
  }
}
