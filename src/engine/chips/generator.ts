import { BaseChip } from './framework.ts';
import type { ChipInfo } from './framework.ts';
import { State, PinType } from '../signal/state.ts';

/**
 * A fixed power rail: pin 1 is always High, pin 2 always Low.
 *
 * ```
 *        --------
 *  VCC --|1    2|-- GND
 *        --------
 * ```
 */
export class Generator extends BaseChip {
  static readonly TYPE = 'generator';
  static readonly VCC = 1;
  static readonly GND = 2;
  readonly type = Generator.TYPE;

  constructor() {
    super([PinType.Output, PinType.Output]);
    this.drive();
  }

  run(_elapsed: number): void {
    this.drive();
  }

  info(): ChipInfo {
    return {
      name: 'Generator',
      description: 'A power source providing VCC on pin 1 and GND on pin 2',
      data: '',
    };
  }

  private drive(): void {
    this.write(Generator.VCC, State.High);
    this.write(Generator.GND, State.Low);
  }
}
