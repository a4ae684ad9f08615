// packages/erd/src/crowfoot.ts
import type { ArrowSymbol, Cardinality, RenderOptions } from '@schemagraph/core';

export const CROWFOOTS: Readonly<Record<Cardinality, ArrowSymbol>> = {
  '0..1': 'teeodot',  // one or zero
  '1': 'teetee',      // exactly one
  '0..N': 'crowodot', // zero or many
  '1..N': 'crowtee'   // one or many
};

export function isCardinality(value: unknown): value is Cardinality {
  return typeof value === 'string' && Object.hasOwn(CROWFOOTS, value);
}

/** Arrow end for a cardinality token. Unknown or absent tokens get no marker. */
export function crowfoot(cardinality: string | null | undefined, options: Pick<RenderOptions, 'display_crowfoots'>): ArrowSymbol {
  if (!options.display_crowfoots) return 'none';
  return isCardinality(cardinality) ? CROWFOOTS[cardinality] : 'none';
}
