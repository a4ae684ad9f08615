import { describe, it, expect } from 'vitest';
import { crowfoot, isCardinality } from '../src';

const on = { display_crowfoots: true };
const off = { display_crowfoots: false };

describe('crowfoot', () => {
  it('maps the four cardinalities to distinct arrow ends', () => {
    expect(crowfoot('0..1', on)).toBe('teeodot');
    expect(crowfoot('1', on)).toBe('teetee');
    expect(crowfoot('0..N', on)).toBe('crowodot');
    expect(crowfoot('1..N', on)).toBe('crowtee');
  });

  it('no marker when crowfoots are disabled', () => {
    expect(crowfoot('1..N', off)).toBe('none');
  });

  it('no marker for unknown or absent tokens', () => {
    expect(crowfoot('bogus', on)).toBe('none');
    expect(crowfoot(undefined, on)).toBe('none');
    expect(crowfoot(null, on)).toBe('none');
    // not an own key of the lookup table
    expect(crowfoot('toString', on)).toBe('none');
  });

  it('isCardinality only accepts the four tokens', () => {
    expect(isCardinality('0..N')).toBe(true);
    expect(isCardinality('N')).toBe(false);
    expect(isCardinality(1)).toBe(false);
  });
});
