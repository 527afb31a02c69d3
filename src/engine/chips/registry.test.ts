import { describe, it, expect } from 'vitest';
import { createChip, CHIP_TYPES, GATE_DEFINITIONS, isKnownChipType } from './registry.ts';
import { GateChip } from './gate.ts';
import { Generator } from './generator.ts';
import { Ram256, Rom256 } from './memory.ts';

describe('Chip Registry', () => {
  it('knows every gate, the generator and both memories', () => {
    expect(CHIP_TYPES).toEqual([
      ...GATE_DEFINITIONS.map((d) => d.type),
      'generator',
      'ram-256b',
      'rom-256b',
    ]);
  });

  it.each(CHIP_TYPES.map((type) => [type]))('builds %s with a matching type tag', (type) => {
    const chip = createChip(type);
    expect(chip?.type).toBe(type);
  });

  it('builds the right classes', () => {
    expect(createChip('gate-nor')).toBeInstanceOf(GateChip);
    expect(createChip('generator')).toBeInstanceOf(Generator);
    expect(createChip('ram-256b')).toBeInstanceOf(Ram256);
    expect(createChip('rom-256b')).toBeInstanceOf(Rom256);
  });

  it('builds a fresh chip on every call', () => {
    expect(createChip('generator')).not.toBe(createChip('generator'));
  });

  it('returns undefined for unknown tags', () => {
    expect(createChip('gate-xor')).toBeUndefined();
    expect(isKnownChipType('gate-xor')).toBe(false);
    expect(isKnownChipType('gate-and')).toBe(true);
  });
});
