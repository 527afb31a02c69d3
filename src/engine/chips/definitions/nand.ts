import { defineGate, notAllHigh } from '../gate.ts';
import { State } from '../../signal/state.ts';

/**
 * Four 2-input NAND gates.
 *
 * ```
 *           ---__---
 *       A --|1   14|-- VCC
 *       B --|2   13|-- E
 *  !(A&B) --|3   12|-- F
 *       C --|4   11|-- !(E&F)
 *       D --|5   10|-- G
 *  !(C&D) --|6    9|-- H
 *     GND --|7    8|-- !(G&H)
 *           --------
 * ```
 */
export const nandGate = defineGate({
  type: 'gate-nand',
  name: 'Gate NAND',
  description: 'A 4-in-one NAND gate chip',
  pinCount: 14,
  pins: {
    A: 1, B: 2, NOT_A_AND_B: 3,
    C: 4, D: 5, NOT_C_AND_D: 6,
    E: 13, F: 12, NOT_E_AND_F: 11,
    G: 10, H: 9, NOT_G_AND_H: 8,
    VCC: 14, GND: 7,
  },
  vcc: 14,
  gnd: 7,
  gates: [
    { output: 3, inputs: [1, 2], evaluate: notAllHigh },
    { output: 6, inputs: [4, 5], evaluate: notAllHigh },
    { output: 11, inputs: [13, 12], evaluate: notAllHigh },
    { output: 8, inputs: [10, 9], evaluate: notAllHigh },
  ],
  unpowered: State.Undefined,
});
