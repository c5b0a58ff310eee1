/**
 * Remembers the first-seen value of every key touched while a unit of work
 * is open so the map can be put back exactly as it was.
 */
export class UndoJournal<K, V> {
  private readonly originals = new Map<K, V | undefined>();
  private tracking = false;

  constructor(
    private readonly target: Map<K, V>,
    private readonly clone: (value: V) => V,
  ) {}

  begin(): void {
    this.originals.clear();
    this.tracking = true;
  }

  record(key: K): void {
    if (!this.tracking || this.originals.has(key)) {
      return;
    }

    const current = this.target.get(key);
    this.originals.set(
      key,
      current === undefined ? undefined : this.clone(current),
    );
  }

  commit(): void {
    this.originals.clear();
    this.tracking = false;
  }

  rollback(): void {
    for (const [key, original] of this.originals) {
      if (original === undefined) {
        this.target.delete(key);
      } else {
        this.target.set(key, original);
      }
    }

    this.originals.clear();
    this.tracking = false;
  }
}
