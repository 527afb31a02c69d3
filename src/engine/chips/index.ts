export type { Chip, ChipFactory, ChipInfo, ChipDataError, PinOutOfBoundsError } from './framework.ts';
export { BaseChip } from './framework.ts';
export type { GateDefinition, GateOutput, GateFunction } from './gate.ts';
export { GateChip, defineGate, allHigh, anyHigh, notAllHigh, noneHigh, allLow } from './gate.ts';
export { Generator } from './generator.ts';
export { Ram256, Rom256, MEMORY_PINS, hexDump } from './memory.ts';
export { GATE_DEFINITIONS, CHIP_TYPES, createChip, isKnownChipType } from './registry.ts';
export * from './definitions/index.ts';
