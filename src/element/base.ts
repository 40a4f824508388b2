import type { HttpMethod, Inputs } from '../types.js';
import type { Logger } from '../logger.js';
import type { Page } from './page.js';

export type ElementType = 'cookie' | 'link' | 'form';

/** Context an element is audited under; an element without a page is an orphan. */
export interface Auditor {
  page?: Page;
  logger: Logger;
}

export interface ElementOptions {
  /** Cookie pair to send with the element's own inputs. */
  cookies?: Inputs;
}

export abstract class BaseElement {
  abstract readonly type: ElementType;
  readonly url: string;
  action: string;
  method: HttpMethod;
  /** Which input (or which rule) produced this variant. */
  altered?: string;
  auditor?: Auditor;
  opts: ElementOptions = {};
  protected inputs: Inputs;
  private scopeOverridden = false;

  constructor(url: string, inputs: Inputs = {}, method: HttpMethod = 'get', action: string = url) {
    this.url = url;
    this.action = action;
    this.method = method;
    this.inputs = { ...inputs };
  }

  get auditable(): Inputs {
    return { ...this.inputs };
  }

  set auditable(inputs: Inputs) {
    this.inputs = { ...inputs };
  }

  /** Lets the element through scope checks that match on known input names. */
  overrideInstanceScope(): void {
    this.scopeOverridden = true;
  }

  isScopeOverridden(): boolean {
    return this.scopeOverridden;
  }

  isOrphan(): boolean {
    return this.auditor?.page === undefined;
  }

  identity(): string {
    return JSON.stringify([this.type, this.method, this.action, this.inputs, this.opts.cookies ?? null]);
  }

  abstract dup(): BaseElement;

  protected copyStateTo<T extends BaseElement>(target: T): T {
    target.action = this.action;
    target.method = this.method;
    target.altered = this.altered;
    target.auditor = this.auditor;
    target.opts = this.opts.cookies ? { ...this.opts, cookies: { ...this.opts.cookies } } : { ...this.opts };
    target.inputs = { ...this.inputs };
    target.scopeOverridden = this.scopeOverridden;
    return target;
  }
}

/** Drops later elements whose {@link BaseElement.identity} was already seen. */
export function uniqueElements<E extends BaseElement>(elements: readonly E[]): E[] {
  const seen = new Set<string>();
  return elements.filter((element) => {
    const key = element.identity();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
