/**
 * Cookie store for a single site.
 *
 * Steam's community and API hosts share one logical cookie set for this
 * client, so cookies are keyed by name only. Attributes (Path, Domain,
 * Secure...) are parsed just far enough to honour deletion.
 */
export class CookieJar {
  private cookies = new Map<string, string>();

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  has(name: string): boolean {
    return this.cookies.has(name);
  }

  set(name: string, value: string): void {
    this.cookies.set(name, value);
  }

  delete(name: string): void {
    this.cookies.delete(name);
  }

  get size(): number {
    return this.cookies.size;
  }

  /**
   * Store a cookie from a `Set-Cookie` header value or a bare `name=value` pair.
   * Expired cookies (Max-Age <= 0, or an Expires date in the past) are removed.
   */
  setFromHeader(header: string, now: Date = new Date()): void {
    const [pair, ...attributes] = header.split(';');
    const separator = pair.indexOf('=');
    if (separator <= 0) return;

    const name = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    if (!name) return;

    for (const attribute of attributes) {
      const [rawKey, ...rest] = attribute.split('=');
      const key = rawKey.trim().toLowerCase();
      const attrValue = rest.join('=').trim();

      if (key === 'max-age' && Number(attrValue) <= 0) {
        this.cookies.delete(name);
        return;
      }
      if (key === 'expires') {
        const expires = Date.parse(attrValue);
        if (!Number.isNaN(expires) && expires <= now.getTime()) {
          this.cookies.delete(name);
          return;
        }
      }
    }

    this.cookies.set(name, value);
  }

  /** Value for a `Cookie` request header, in insertion order. */
  toHeader(): string {
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ');
  }

  entries(): Array<[string, string]> {
    return Array.from(this.cookies);
  }
}
