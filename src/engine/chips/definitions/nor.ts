import { defineGate, noneHigh } from '../gate.ts';
import { State } from '../../signal/state.ts';

/**
 * Four 2-input NOR gates. Outputs sit on the outer pins of each group.
 *
 * ```
 *           ---__---
 *  !(A|B) --|1   14|-- VCC
 *       A --|2   13|-- !(E|F)
 *       B --|3   12|-- E
 *  !(C|D) --|4   11|-- F
 *       C --|5   10|-- !(G|H)
 *       D --|6    9|-- G
 *     GND --|7    8|-- H
 *           --------
 * ```
 */
export const norGate = defineGate({
  type: 'gate-nor',
  name: 'Gate NOR',
  description: 'A 4-in-one NOR gate chip',
  pinCount: 14,
  pins: {
    NOT_A_OR_B: 1, A: 2, B: 3,
    NOT_C_OR_D: 4, C: 5, D: 6,
    NOT_E_OR_F: 13, E: 12, F: 11,
    NOT_G_OR_H: 10, G: 9, H: 8,
    VCC: 14, GND: 7,
  },
  vcc: 14,
  gnd: 7,
  gates: [
    { output: 1, inputs: [2, 3], evaluate: noneHigh },
    { output: 4, inputs: [5, 6], evaluate: noneHigh },
    { output: 13, inputs: [12, 11], evaluate: noneHigh },
    { output: 10, inputs: [9, 8], evaluate: noneHigh },
  ],
  unpowered: State.Low,
});
