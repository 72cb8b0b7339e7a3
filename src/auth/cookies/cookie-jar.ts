/**
 * Request cookie jar with delta tracking
 *
 * A jar is built from the inbound `Cookie` header and never mutated:
 * `add` and `remove` return a new jar. Only cookies changed since the jar
 * was built are emitted as `Set-Cookie` headers, unchanged inbound cookies
 * are never echoed back.
 */

import { parse, serialize, type SerializeOptions } from 'cookie';

export type SameSite = 'strict' | 'lax' | 'none';

export interface CookieAttributes {
  path?: string;
  domain?: string;
  /** Seconds; zero expires the cookie immediately */
  maxAge?: number;
  expires?: Date;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: SameSite;
}

export interface Cookie {
  name: string;
  value: string;
  attributes?: CookieAttributes;
}

const COOKIE_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Parse a single `name=value` segment, returning undefined for anything
 * that is not a well-formed pair.
 */
function parseSegment(segment: string): { name: string; value: string } | undefined {
  const trimmed = segment.trim();
  if (!trimmed.includes('=')) {
    return undefined;
  }
  for (const [name, value] of Object.entries(parse(trimmed))) {
    if (value !== undefined && COOKIE_NAME_PATTERN.test(name)) {
      return { name, value };
    }
  }
  return undefined;
}

function toSerializeOptions(attributes: CookieAttributes = {}): SerializeOptions {
  return {
    path: attributes.path,
    domain: attributes.domain,
    maxAge: attributes.maxAge,
    expires: attributes.expires,
    httpOnly: attributes.httpOnly,
    secure: attributes.secure,
    sameSite: attributes.sameSite,
  };
}

export class CookieJar {
  private constructor(
    private readonly original: ReadonlyMap<string, string>,
    private readonly changes: ReadonlyMap<string, Cookie>
  ) {}

  static empty(): CookieJar {
    return new CookieJar(new Map(), new Map());
  }

  /**
   * Build a jar from one or more `Cookie` header values.
   *
   * Segments are split on `;` and trimmed; segments that do not parse as a
   * name/value pair are dropped. When a name repeats, the first occurrence
   * wins.
   */
  static fromHeader(header: string | readonly string[] | undefined): CookieJar {
    const lines = header === undefined ? [] : typeof header === 'string' ? [header] : header;
    const original = new Map<string, string>();

    for (const line of lines) {
      for (const segment of line.split(';')) {
        const pair = parseSegment(segment);
        if (pair && !original.has(pair.name)) {
          original.set(pair.name, pair.value);
        }
      }
    }

    return new CookieJar(original, new Map());
  }

  /**
   * Current value of a cookie, taking pending changes into account
   */
  get(name: string): string | undefined {
    const changed = this.changes.get(name);
    if (changed) {
      return changed.attributes?.maxAge === 0 ? undefined : changed.value;
    }
    return this.original.get(name);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Add or replace a cookie. The cookie is emitted with exactly the given
   * attributes.
   */
  add(cookie: Cookie): CookieJar {
    const changes = new Map(this.changes);
    changes.set(cookie.name, cookie);
    return new CookieJar(this.original, changes);
  }

  /**
   * Remove a cookie. An inbound cookie is expired on the client; a cookie
   * that was only added in this jar is simply dropped from the delta.
   */
  remove(name: string, attributes: Omit<CookieAttributes, 'maxAge' | 'expires'> = { path: '/' }): CookieJar {
    const changes = new Map(this.changes);
    if (this.original.has(name)) {
      changes.set(name, {
        name,
        value: '',
        attributes: { ...attributes, maxAge: 0, expires: new Date(0) },
      });
    } else {
      changes.delete(name);
    }
    return new CookieJar(this.original, changes);
  }

  /**
   * Cookies changed since the jar was built, in insertion order
   */
  delta(): Cookie[] {
    return Array.from(this.changes.values());
  }

  /**
   * Number of cookies visible in the jar
   */
  get size(): number {
    const names = new Set([...this.original.keys(), ...this.changes.keys()]);
    let count = 0;
    for (const name of names) {
      if (this.has(name)) {
        count++;
      }
    }
    return count;
  }

  /**
   * One `Set-Cookie` header value per delta entry
   */
  toSetCookieHeaders(): string[] {
    return this.delta().map(cookie =>
      serialize(cookie.name, cookie.value, toSerializeOptions(cookie.attributes))
    );
  }
}
