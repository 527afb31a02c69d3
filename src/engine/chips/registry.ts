/**
 * Chip Registry
 *
 * Every chip shipped with the library, keyed by type tag. The board never
 * consults this module: pass `createChip` (or your own `ChipFactory`) when
 * loading a saved board.
 */

import type { Chip, ChipFactory } from './framework.ts';
import type { GateDefinition } from './gate.ts';
import { GateChip } from './gate.ts';
import { Generator } from './generator.ts';
import { Ram256, Rom256 } from './memory.ts';
import {
  orGate,
  andGate,
  nandGate,
  norGate,
  notGate,
  and3Gate,
  nand3Gate,
  nor3Gate,
} from './definitions/index.ts';

/**
 * All gate definitions.
 * To add a gate: define it under definitions/ and add it here.
 */
export const GATE_DEFINITIONS: readonly GateDefinition[] = [
  orGate,
  andGate,
  nandGate,
  norGate,
  notGate,
  and3Gate,
  nand3Gate,
  nor3Gate,
];

const builders = new Map<string, () => Chip>([
  ...GATE_DEFINITIONS.map((def): [string, () => Chip] => [def.type, () => new GateChip(def)]),
  [Generator.TYPE, () => new Generator()],
  [Ram256.TYPE, () => new Ram256()],
  [Rom256.TYPE, () => new Rom256()],
]);

/** All type tags `createChip` understands */
export const CHIP_TYPES: readonly string[] = Array.from(builders.keys());

/** Build a fresh chip for a library type tag. */
export const createChip: ChipFactory = (type) => builders.get(type)?.();

export function isKnownChipType(type: string): boolean {
  return builders.has(type);
}
