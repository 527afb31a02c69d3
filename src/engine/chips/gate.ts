/**
 * Combinational gate chips.
 *
 * Every gate package is one `GateDefinition`: a pin map, the power pins, the
 * state forced on every pin while unpowered, and per-output boolean functions.
 * `GateChip` runs any definition, so adding a gate is a data change only.
 */

import { BaseChip } from './framework.ts';
import type { ChipInfo } from './framework.ts';
import { State, PinType } from '../signal/state.ts';

// =============================================================================
// Gate Functions
// =============================================================================

/** Combines the states of a gate's inputs into its output state */
export type GateFunction = (inputs: readonly State[]) => State;

const level = (high: boolean): State => (high ? State.High : State.Low);

export const allHigh: GateFunction = (inputs) => level(inputs.every((s) => s === State.High));

export const anyHigh: GateFunction = (inputs) => level(inputs.some((s) => s === State.High));

export const notAllHigh: GateFunction = (inputs) => level(!inputs.every((s) => s === State.High));

export const noneHigh: GateFunction = (inputs) => level(!inputs.some((s) => s === State.High));

export const allLow: GateFunction = (inputs) => level(inputs.every((s) => s === State.Low));

// =============================================================================
// Definition
// =============================================================================

/** One gate inside a package: its input pins feed `evaluate`, written to `output` */
export interface GateOutput {
  output: number;
  inputs: readonly number[];
  evaluate: GateFunction;
}

export interface GateDefinition<TPins extends Record<string, number> = Record<string, number>> {
  /** Type tag: 'gate-and', 'gate-nor-3', ... */
  type: string;
  name: string;
  description: string;
  pinCount: number;
  /** Named pin numbers, e.g. `{ A: 1, B: 2, A_AND_B: 3 }` */
  pins: TPins;
  vcc: number;
  gnd: number;
  gates: readonly GateOutput[];
  /** State written to every pin while GND is not Low or VCC is not High */
  unpowered: State;
}

/**
 * Create a gate definition with full type inference on its pin names.
 */
export function defineGate<TPins extends Record<string, number>>(
  definition: GateDefinition<TPins>,
): GateDefinition<TPins> {
  return definition;
}

/** Pin directions implied by a definition: gate outputs are Output, the rest Input */
export function gatePinTypes(definition: GateDefinition): PinType[] {
  const outputs = new Set(definition.gates.map((g) => g.output));
  return Array.from({ length: definition.pinCount }, (_, i) =>
    outputs.has(i + 1) ? PinType.Output : PinType.Input,
  );
}

// =============================================================================
// Chip
// =============================================================================

export class GateChip<TPins extends Record<string, number> = Record<string, number>> extends BaseChip {
  readonly type: string;
  readonly definition: GateDefinition<TPins>;

  constructor(definition: GateDefinition<TPins>) {
    super(gatePinTypes(definition));
    this.type = definition.type;
    this.definition = definition;
  }

  run(_elapsed: number): void {
    const { gnd, vcc, gates, unpowered } = this.definition;
    if (!this.isPowered(gnd, vcc)) {
      this.forceAll(unpowered);
      return;
    }
    for (const gate of gates) {
      this.write(gate.output, gate.evaluate(gate.inputs.map((pin) => this.read(pin))));
    }
  }

  info(): ChipInfo {
    return {
      name: this.definition.name,
      description: this.definition.description,
      data: '',
    };
  }
}
