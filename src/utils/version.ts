/**
 * Version name ordering for picking fix-versions
 */

import type { Version } from '../types';

/**
 * Compares version names segment by segment, numerically where both segments
 * are numbers. "3.0.10" sorts after "3.0.9".
 */
export function compareVersionNames(a: string, b: string): number {
  const left = a.split(/[.\-]/);
  const right = b.split(/[.\-]/);

  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const l = left[i];
    const r = right[i];
    if (l === undefined) return -1;
    if (r === undefined) return 1;

    const ln = /^\d+$/.test(l) ? Number(l) : NaN;
    const rn = /^\d+$/.test(r) ? Number(r) : NaN;
    let diff: number;
    if (!Number.isNaN(ln) && !Number.isNaN(rn)) {
      diff = ln - rn;
    } else if (!Number.isNaN(ln)) {
      diff = 1;
    } else if (!Number.isNaN(rn)) {
      diff = -1;
    } else {
      diff = l.localeCompare(r);
    }

    if (diff !== 0) return diff < 0 ? -1 : 1;
  }

  return 0;
}

/**
 * Picks the highest open version whose name starts with `prefix`
 */
export function latestOpenVersion(versions: readonly Version[], prefix: string): Version | undefined {
  return versions
    .filter(version => version.status === 'open' && version.name.startsWith(prefix))
    .sort((a, b) => compareVersionNames(a.name, b.name))
    .pop();
}
