import { defineGate, allLow } from '../gate.ts';
import { State } from '../../signal/state.ts';

/**
 * Three 3-input NOR gates. An output is High only when all three inputs
 * read Low, so a floating input pulls it Low.
 *
 * ```
 *            ---__---
 *        A --|1   14|-- VCC
 *        B --|2   13|-- C
 *        D --|3   12|-- !(A|B|C)
 *        E --|4   11|-- G
 *        F --|5   10|-- H
 * !(D|E|F) --|6    9|-- I
 *      GND --|7    8|-- !(G|H|I)
 *            --------
 * ```
 */
export const nor3Gate = defineGate({
  type: 'gate-nor-3',
  name: 'Gate 3-Input NOR',
  description: 'A 3-in-one 3-Input NOR gate chip',
  pinCount: 14,
  pins: {
    A: 1, B: 2, C: 13, NOT_A_OR_B_OR_C: 12,
    D: 3, E: 4, F: 5, NOT_D_OR_E_OR_F: 6,
    G: 11, H: 10, I: 9, NOT_G_OR_H_OR_I: 8,
    VCC: 14, GND: 7,
  },
  vcc: 14,
  gnd: 7,
  gates: [
    { output: 12, inputs: [1, 2, 13], evaluate: allLow },
    { output: 6, inputs: [3, 4, 5], evaluate: allLow },
    { output: 8, inputs: [11, 10, 9], evaluate: allLow },
  ],
  unpowered: State.Low,
});
