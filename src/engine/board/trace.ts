import type { PinRef } from '../../shared/types/index.ts';
import type { Pin } from '../signal/pin.ts';
import { State, PinType } from '../signal/state.ts';

/**
 * Resolve the level of a bus from its drivers.
 *
 * Only Output pins drive. Any High wins; otherwise any Low; a bus with no
 * driver, or only Undefined drivers, floats to Undefined. Several drivers
 * disagreeing is not an error.
 */
export function resolveBus(pins: Iterable<Pin>): State {
  let resolved: State = State.Undefined;
  for (const pin of pins) {
    if (pin.type !== PinType.Output) continue;
    if (pin.state === State.High) return State.High;
    if (pin.state === State.Low) resolved = State.Low;
  }
  return resolved;
}

/** A wire tying pins of (usually) different chips together. */
export class Trace {
  private readonly link: Pin[] = [];

  /** Connected pins in insertion order */
  get pins(): readonly Pin[] {
    return this.link;
  }

  connect(pin: Pin): void {
    this.link.push(pin);
  }

  /** Drive every non-Output pin with the resolved bus level. */
  communicate(): State {
    const state = resolveBus(this.link);
    for (const pin of this.link) {
      if (pin.type !== PinType.Output) {
        pin.state = state;
      }
    }
    return state;
  }

  save(): PinRef[] {
    return this.link.map((pin) => ({ chipId: pin.chipId, pin: pin.index }));
  }
}
