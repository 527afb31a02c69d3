import { defineGate, noneHigh } from '../gate.ts';
import { State } from '../../signal/state.ts';

/**
 * Six inverters.
 *
 * ```
 *        ---__---
 *    A --|1   14|-- VCC
 *   !A --|2   13|-- D
 *    B --|3   12|-- !D
 *   !B --|4   11|-- E
 *    C --|5   10|-- !E
 *   !C --|6    9|-- F
 *  GND --|7    8|-- !F
 *        --------
 * ```
 */
export const notGate = defineGate({
  type: 'gate-not',
  name: 'Gate NOT',
  description: 'A 6-in-one NOT gate chip',
  pinCount: 14,
  pins: {
    A: 1, NOT_A: 2,
    B: 3, NOT_B: 4,
    C: 5, NOT_C: 6,
    D: 13, NOT_D: 12,
    E: 11, NOT_E: 10,
    F: 9, NOT_F: 8,
    VCC: 14, GND: 7,
  },
  vcc: 14,
  gnd: 7,
  gates: [
    { output: 2, inputs: [1], evaluate: noneHigh },
    { output: 4, inputs: [3], evaluate: noneHigh },
    { output: 6, inputs: [5], evaluate: noneHigh },
    { output: 12, inputs: [13], evaluate: noneHigh },
    { output: 10, inputs: [11], evaluate: noneHigh },
    { output: 8, inputs: [9], evaluate: noneHigh },
  ],
  unpowered: State.Undefined,
});
