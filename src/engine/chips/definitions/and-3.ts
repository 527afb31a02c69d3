import { defineGate, allHigh } from '../gate.ts';
import { State } from '../../signal/state.ts';

/**
 * Three 3-input AND gates.
 *
 * ```
 *            ---__---
 *        A --|1   14|-- VCC
 *        B --|2   13|-- C
 *        D --|3   12|-- A&B&C
 *        E --|4   11|-- G
 *        F --|5   10|-- H
 *    D&E&F --|6    9|-- I
 *      GND --|7    8|-- G&H&I
 *            --------
 * ```
 */
export const and3Gate = defineGate({
  type: 'gate-and-3',
  name: 'Gate 3-Input AND',
  description: 'A 3-in-one 3-Input AND gate chip',
  pinCount: 14,
  pins: {
    A: 1, B: 2, C: 13, A_AND_B_AND_C: 12,
    D: 3, E: 4, F: 5, D_AND_E_AND_F: 6,
    G: 11, H: 10, I: 9, G_AND_H_AND_I: 8,
    VCC: 14, GND: 7,
  },
  vcc: 14,
  gnd: 7,
  gates: [
    { output: 12, inputs: [1, 2, 13], evaluate: allHigh },
    { output: 6, inputs: [3, 4, 5], evaluate: allHigh },
    { output: 8, inputs: [11, 10, 9], evaluate: allHigh },
  ],
  unpowered: State.Undefined,
});
