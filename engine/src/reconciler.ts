/**
 * Reconciles the classified return sites of one function into a single
 * resolution. The policy is conservative: divergent return sites are never
 * merged into a best guess, the function is skipped instead.
 */

import { ClassifiedReturn, Resolution } from './types';

export function reconcile(returns: readonly ClassifiedReturn[]): Resolution {
  if (returns.length === 0) {
    return { tag: 'keep', reason: 'void' };
  }

  const types = new Set(returns.map(r => r.type));

  if (types.size === 1) {
    const [only] = types;
    return only === 'unclassified'
      ? { tag: 'skip', reason: 'unrecognized' }
      : { tag: 'insert', type: only };
  }

  return { tag: 'skip', reason: 'ambiguous' };
}
