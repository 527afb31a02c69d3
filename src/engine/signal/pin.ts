import type { ChipId } from '../../shared/types/index.ts';
import { State } from './state.ts';
import type { PinType } from './state.ts';

/**
 * A single chip terminal.
 *
 * Created by its chip and owned by it for the chip's lifetime. Traces hold
 * references to the same object: the owning chip writes its Output pins, a
 * trace writes every pin that is not an Output.
 */
export class Pin {
  readonly chipId: ChipId;
  /** 1-based position on the chip */
  readonly index: number;
  type: PinType;
  state: State = State.Undefined;

  constructor(chipId: ChipId, index: number, type: PinType) {
    this.chipId = chipId;
    this.index = index;
    this.type = type;
  }
}
