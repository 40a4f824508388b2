import { uniqueElements } from '../base.js';
import { fillInputs } from '../key-filler.js';
import { createSeed, type Mutable, type MutableOptions } from '../mutable.js';
import type { Form, Link } from '../page.js';
import type { Cookie } from './cookie.js';

export type ElementMutation = Cookie | Link | Form;

export interface CookieMutationOptions extends MutableOptions {
  /** Add a variant that carries the payload as the cookie name. */
  paramFlip?: boolean;
  /** Value for the flipped cookie; a fresh random seed when omitted. */
  seed?: string;
  /** Also send every variant along with the page's links and forms. */
  auditCookiesExtensively?: boolean;
}

export const PARAM_FLIP = 'Parameter flip';

export function propagationLabel(altered: string | undefined): string {
  return `mutation for the '${altered ?? ''}' cookie`;
}

/**
 * Cookie variants for one payload: the baseline from `mutable`, an optional
 * parameter flip, and, in extensive mode, copies of the page's links and
 * forms that carry each variant in their `cookies` option.
 */
export function cookieMutations(
  cookie: Cookie,
  payload: string,
  options: CookieMutationOptions,
  mutable: Mutable
): ElementMutation[] {
  const { paramFlip = false, seed, auditCookiesExtensively = false, ...mutableOptions } = options;
  const variants: Cookie[] = mutable.mutations(cookie, payload, mutableOptions);

  if (paramFlip) {
    const flipped = cookie.dup();
    // a flipped name is never on the list of discovered cookie names
    flipped.overrideInstanceScope();
    flipped.altered = PARAM_FLIP;
    flipped.auditable = { [payload]: seed ?? createSeed() };
    variants.push(flipped);
  }

  const auditor = cookie.auditor;
  const page = auditor?.page;
  if (!auditCookiesExtensively || !auditor || !page) return uniqueElements(variants);

  const targets = uniqueElements<Link | Form>([...page.links, ...page.forms]).filter(
    (element) => Object.keys(element.auditable).length > 0
  );

  const propagated = variants.flatMap((variant) =>
    targets.map((element) => {
      const clone = element.dup();
      clone.altered = propagationLabel(variant.altered);
      clone.auditor = auditor;
      clone.opts.cookies = variant.auditable;
      clone.auditable = fillInputs(clone.auditable);
      return clone;
    })
  );

  return uniqueElements<ElementMutation>([...variants, ...propagated]);
}
