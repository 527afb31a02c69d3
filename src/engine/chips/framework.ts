/**
 * Chip Framework
 *
 * The execution contract every chip honours, plus the base class that owns
 * the pin array. A board only ever talks to chips through `Chip`.
 */

import type { ChipId } from '../../shared/types/index.ts';
import type { Result } from '../../shared/result/index.ts';
import { ok, err } from '../../shared/result/index.ts';
import { generateId } from '../../shared/generate-id.ts';
import { Pin } from '../signal/pin.ts';
import { State } from '../signal/state.ts';
import type { PinType } from '../signal/state.ts';

// =============================================================================
// Core Types
// =============================================================================

/** Human readable description of a chip instance */
export interface ChipInfo {
  name: string;
  description: string;
  /** Dump of internal state, empty for stateless chips */
  data: string;
}

export interface PinOutOfBoundsError {
  kind: 'pin-out-of-bounds';
  message: string;
  index: number;
  pinCount: number;
}

export interface ChipDataError {
  kind: 'invalid-chip-data';
  message: string;
  chipType: string;
}

/** Uniform contract between a board and the chips it runs. */
export interface Chip {
  readonly id: ChipId;
  /** Stable tag used to rebuild the chip through a `ChipFactory` */
  readonly type: string;
  readonly pinCount: number;
  /** Pin at a 1-based index */
  pin(index: number): Result<Pin, PinOutOfBoundsError>;
  /** Read inputs, write outputs. `elapsed` is in milliseconds. */
  run(elapsed: number): void;
  info(): ChipInfo;
  /** Opaque persisted state; stateless chips return `[]` */
  saveData(): string[];
  loadData(data: readonly string[]): Result<void, ChipDataError>;
}

/** Builds a fresh chip for a type tag, or `undefined` if the tag is unknown. */
export type ChipFactory = (type: string) => Chip | undefined;

// =============================================================================
// Base Class
// =============================================================================

export abstract class BaseChip implements Chip {
  readonly id: ChipId = generateId();
  abstract readonly type: string;
  protected readonly pins: readonly Pin[];

  /** One entry per pin, in pin order starting at pin 1 */
  protected constructor(pinTypes: readonly PinType[]) {
    this.pins = pinTypes.map((type, i) => new Pin(this.id, i + 1, type));
  }

  get pinCount(): number {
    return this.pins.length;
  }

  pin(index: number): Result<Pin, PinOutOfBoundsError> {
    if (!Number.isInteger(index) || index < 1 || index > this.pins.length) {
      return err({
        kind: 'pin-out-of-bounds',
        message: `Pin ${index} is out of bounds for ${this.type} (1..${this.pins.length})`,
        index,
        pinCount: this.pins.length,
      });
    }
    return ok(this.pins[index - 1]);
  }

  abstract run(elapsed: number): void;

  abstract info(): ChipInfo;

  saveData(): string[] {
    return [];
  }

  loadData(_data: readonly string[]): Result<void, ChipDataError> {
    return ok(undefined);
  }

  // ─── Helpers for subclasses (1-based pin numbers) ─────────────────────────

  protected read(pin: number): State {
    return this.pins[pin - 1].state;
  }

  protected write(pin: number, state: State): void {
    this.pins[pin - 1].state = state;
  }

  protected setType(pins: readonly number[], type: PinType): void {
    for (const pin of pins) {
      this.pins[pin - 1].type = type;
    }
  }

  /** GND reads Low and VCC reads High */
  protected isPowered(gnd: number, vcc: number): boolean {
    return this.read(gnd) === State.Low && this.read(vcc) === State.High;
  }

  /** Force the state of every pin, regardless of direction */
  protected forceAll(state: State): void {
    for (const pin of this.pins) {
      pin.state = state;
    }
  }
}
