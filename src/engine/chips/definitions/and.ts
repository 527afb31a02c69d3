import { defineGate, allHigh } from '../gate.ts';
import { State } from '../../signal/state.ts';

/**
 * Four 2-input AND gates.
 *
 * ```
 *        ---__---
 *    A --|1   14|-- VCC
 *    B --|2   13|-- E
 *  A&B --|3   12|-- F
 *    C --|4   11|-- E&F
 *    D --|5   10|-- G
 *  C&D --|6    9|-- H
 *  GND --|7    8|-- G&H
 *        --------
 * ```
 */
export const andGate = defineGate({
  type: 'gate-and',
  name: 'Gate AND',
  description: 'A 4-in-one AND gate chip',
  pinCount: 14,
  pins: {
    A: 1, B: 2, A_AND_B: 3,
    C: 4, D: 5, C_AND_D: 6,
    E: 13, F: 12, E_AND_F: 11,
    G: 10, H: 9, G_AND_H: 8,
    VCC: 14, GND: 7,
  },
  vcc: 14,
  gnd: 7,
  gates: [
    { output: 3, inputs: [1, 2], evaluate: allHigh },
    { output: 6, inputs: [4, 5], evaluate: allHigh },
    { output: 11, inputs: [13, 12], evaluate: allHigh },
    { output: 8, inputs: [10, 9], evaluate: allHigh },
  ],
  unpowered: State.Undefined,
});
