/** Tri-value logic level carried by a pin or a trace. */
export const State = {
  High: 'high',
  Low: 'low',
  Undefined: 'undefined',
} as const;

export type State = (typeof State)[keyof typeof State];

/** Direction of a pin. Bus pins switch between Input and Output at runtime. */
export const PinType = {
  Input: 'input',
  Output: 'output',
  Undefined: 'undefined',
} as const;

export type PinType = (typeof PinType)[keyof typeof PinType];

/** Bit `index` (0 = least significant) of `byte` as High or Low. */
export function stateFromBit(byte: number, index: number): State {
  return (byte >> index) & 1 ? State.High : State.Low;
}
