/**
 * Deterministic, collision-free anchors
 */

export function anchorSlug(prefix: string, ...names: string[]): string {
  return [prefix, ...names.map(name => name.toLowerCase())].join('-');
}

/**
 * Hands out anchors in traversal order; a repeated slug gets a numeric suffix
 * (`method-a-get`, then `method-a-get-1`).
 */
export class AnchorRegistry {
  private used: Map<string, number> = new Map();

  claim(slug: string): string {
    const seen = this.used.get(slug) ?? 0;
    this.used.set(slug, seen + 1);
    return seen === 0 ? slug : `${slug}-${seen}`;
  }
}
