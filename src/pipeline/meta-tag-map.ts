/**
 * Meta tag values keyed by their normalized (trimmed, lower-cased) `property`
 * or `name`. Lookups normalize the same way, so `OG:Title` and `og:title`
 * address one entry. A repeated key replaces the earlier value.
 */
export class MetaTagMap {
  private readonly entries = new Map<string, string>();

  static normalizeKey(key: string): string {
    return key.trim().toLowerCase();
  }

  static from(entries: Record<string, string>): MetaTagMap {
    const map = new MetaTagMap();
    for (const [key, value] of Object.entries(entries)) map.set(key, value);
    return map;
  }

  set(key: string, value: string): void {
    this.entries.set(MetaTagMap.normalizeKey(key), value);
  }

  get(key: string): string | undefined {
    return this.entries.get(MetaTagMap.normalizeKey(key));
  }

  /** First non-empty value among `keys`, in order; empty string when none. */
  firstOf(...keys: string[]): string {
    for (const key of keys) {
      const value = this.get(key);
      if (value) return value;
    }
    return '';
  }

  get size(): number {
    return this.entries.size;
  }
}
