import { createHash, randomBytes } from 'node:crypto';
import type { BaseElement } from './base.js';

export interface MutationStrategy {
  id: string;
  mutate: (value: string, payload: string) => string;
}

export const replaceStrategy: MutationStrategy = {
  id: 'replace',
  mutate: (_value, payload) => payload,
};

export const appendStrategy: MutationStrategy = {
  id: 'append',
  mutate: (value, payload) => value + payload,
};

export const DEFAULT_STRATEGIES: readonly MutationStrategy[] = [replaceStrategy, appendStrategy];

export interface MutableOptions {
  /** Restrict the baseline to these strategy ids. */
  strategies?: readonly string[];
}

type Duplicable<E> = { dup(): E } & BaseElement;

export interface Mutable {
  mutations<E extends Duplicable<E>>(element: E, payload: string, options?: MutableOptions): E[];
}

/**
 * Baseline mutations: one copy of the element per input and strategy, with
 * that input rewritten and `altered` set to the input name.
 */
export function createMutable(strategies: readonly MutationStrategy[] = DEFAULT_STRATEGIES): Mutable {
  return {
    mutations(element, payload, options = {}) {
      const allowed = options.strategies;
      const selected = allowed ? strategies.filter((s) => allowed.includes(s.id)) : strategies;
      const inputs = element.auditable;
      const mutations: Array<typeof element> = [];

      for (const [key, value] of Object.entries(inputs)) {
        for (const strategy of selected) {
          const mutation = element.dup();
          mutation.auditable = { ...inputs, [key]: strategy.mutate(value, payload) };
          mutation.altered = key;
          mutations.push(mutation);
        }
      }

      return mutations;
    },
  };
}

/** Random marker used where a mutation needs a harmless, recognisable value. */
export function createSeed(): string {
  return createHash('sha256').update(randomBytes(16)).digest('hex');
}
