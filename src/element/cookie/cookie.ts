import { NoSuchAttributeError } from '../../errors.js';
import type { Inputs } from '../../types.js';
import { BaseElement } from '../base.js';
import { createMutable, type Mutable } from '../mutable.js';
import {
  cloneAttributes,
  isAttributeName,
  mergeAttributes,
  type AttributeName,
  type AttributeSet,
  type AttributeValue,
  type RawAttributes,
  type RawValue,
} from './attributes.js';
import { decode, encode } from './codec.js';
import { cookieMutations, type CookieMutationOptions, type ElementMutation } from './mutations.js';

function pairValue(value: RawValue): string {
  if (value === undefined || value === null) return '';
  return value instanceof Date ? value.toUTCString() : String(value);
}

/**
 * An HTTP cookie as a fuzzable element: one name/value pair plus the
 * attributes it was set with. Requests for it are always GETs to the owner URL.
 *
 * @example
 *   const cookie = new Cookie('http://owner-url.com/', { name: 'session', value: 'abc' });
 *   cookie.toString(); // 'session=abc'
 *   cookie.path;       // '/'
 */
export class Cookie extends BaseElement {
  readonly type = 'cookie';
  private attributes: Readonly<AttributeSet>;
  private snapshot: Readonly<Inputs>;
  private readonly mutable: Mutable;

  /**
   * @param url - owner URL; `path` and `domain` default to its path and host
   * @param raw - attribute map, or a bare `{ name: value }` pair
   * @param mutable - baseline mutation capability
   */
  constructor(url: string, raw: RawAttributes = {}, mutable: Mutable = createMutable()) {
    super(url, {}, 'get', url);
    this.mutable = mutable;

    const attributes = mergeAttributes(raw);
    if (attributes.value) attributes.value = decode(attributes.value);

    const owner = new URL(url);
    if (attributes.path === null) attributes.path = owner.pathname || '/';
    if (attributes.domain === null) attributes.domain = owner.hostname;
    this.attributes = Object.freeze(attributes);

    if (attributes.name !== null && attributes.value !== null) {
      this.auditable = { [attributes.name]: attributes.value };
    } else {
      const [first] = Object.entries(raw);
      this.auditable = first ? { [first[0]]: decode(pairValue(first[1])) } : {};
    }

    this.snapshot = Object.freeze(this.auditable);
  }

  static hasAttribute(name: string): name is AttributeName {
    return isAttributeName(name);
  }

  get auditable(): Inputs {
    return { ...this.inputs };
  }

  /** Replaces the pair; the `name`/`value` attributes follow, an empty name clears both. */
  set auditable(inputs: Inputs) {
    const [entry] = Object.entries(inputs);
    const next = cloneAttributes(this.attributes);

    if (!entry || !entry[0]) {
      this.inputs = {};
      next.name = null;
      next.value = null;
    } else {
      this.inputs = { [entry[0]]: entry[1] };
      next.name = entry[0];
      next.value = entry[1];
    }

    this.attributes = Object.freeze(next);
  }

  /** The pair as it was when the cookie was built. */
  get original(): Readonly<Inputs> {
    return this.snapshot;
  }

  isDrifted(): boolean {
    const [current] = Object.entries(this.inputs);
    const [original] = Object.entries(this.snapshot);
    return current?.[0] !== original?.[0] || current?.[1] !== original?.[1];
  }

  attribute<K extends AttributeName>(name: K): AttributeSet[K] {
    return cloneAttributes(this.attributes)[name];
  }

  /** @throws {NoSuchAttributeError} for names outside the fixed attribute set */
  get(name: string): AttributeValue {
    if (!isAttributeName(name)) throw new NoSuchAttributeError(name);
    return this.attribute(name);
  }

  get name(): string | null {
    return this.attributes.name;
  }

  get value(): string | null {
    return this.attributes.value;
  }

  get domain(): string | null {
    return this.attributes.domain;
  }

  get path(): string | null {
    return this.attributes.path;
  }

  get expires(): Date | null {
    return this.attribute('expires');
  }

  get maxAge(): number | null {
    return this.attributes.max_age;
  }

  get version(): number {
    return this.attributes.version;
  }

  get port(): string | null {
    return this.attributes.port;
  }

  get comment(): string | null {
    return this.attributes.comment;
  }

  get commentUrl(): string | null {
    return this.attributes.comment_url;
  }

  get discard(): boolean | null {
    return this.attributes.discard;
  }

  isSecure(): boolean {
    return this.attributes.secure === true;
  }

  isHttpOnly(): boolean {
    return this.attributes.httponly === true;
  }

  /** No expiry: the cookie lives for the browser session. */
  isSession(): boolean {
    return this.attributes.expires === null;
  }

  expiresAt(): Date | null {
    return this.expires;
  }

  isExpired(time: Date = new Date()): boolean {
    const expires = this.attributes.expires;
    return expires !== null && time.getTime() > expires.getTime();
  }

  simple(): Inputs {
    return this.auditable;
  }

  mutations(payload: string, options: CookieMutationOptions = {}): ElementMutation[] {
    return cookieMutations(this, payload, options, this.mutable);
  }

  dup(): Cookie {
    const copy = this.copyStateTo(new Cookie(this.url, {}, this.mutable));
    copy.attributes = Object.freeze(cloneAttributes(this.attributes));
    copy.snapshot = this.snapshot;
    return copy;
  }

  /** Value for a `Cookie` request header. */
  toString(): string {
    return `${encode(this.name ?? '')}=${encode(this.value ?? '')}`;
  }

  toJSON(): Omit<AttributeSet, 'expires'> & { expires: string | null } {
    return { ...this.attributes, expires: this.attributes.expires?.toISOString() ?? null };
  }
}
