/** Remembers the most recent ids, oldest evicted first. */
export class RecentIdCache {
  private readonly ids = new Set<string>();

  constructor(private readonly capacity: number) {}

  /** False when `id` was already seen. */
  remember(id: string): boolean {
    if (this.ids.has(id)) {
      return false;
    }
    this.ids.add(id);
    if (this.ids.size > this.capacity) {
      const oldest = this.ids.values().next();
      if (!oldest.done) {
        this.ids.delete(oldest.value);
      }
    }
    return true;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }
}
