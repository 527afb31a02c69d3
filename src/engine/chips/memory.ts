/**
 * Byte-addressable memory chips.
 *
 * Both packages share one 22-pin layout. Address bit 7 is routed to pin 12,
 * next to GND, rather than following A6.
 *
 * ```
 *        ---__---
 *  !CS --|1   22|-- VCC
 *  !WE --|2   21|-- UNUSED
 *  !OE --|3   20|-- IO7
 *   A0 --|4   19|-- IO6
 *   A1 --|5   18|-- IO5
 *   A2 --|6   17|-- IO4
 *   A3 --|7   16|-- IO3
 *   A4 --|8   15|-- IO2
 *   A5 --|9   14|-- IO1
 *   A6 --|10  13|-- IO0
 *  GND --|11  12|-- A7
 *        --------
 * ```
 *
 * Pin 2 is unused on the ROM.
 */

import { BaseChip } from './framework.ts';
import type { ChipDataError, ChipInfo } from './framework.ts';
import type { Result } from '../../shared/result/index.ts';
import { ok, err } from '../../shared/result/index.ts';
import { MEMORY_CONFIG } from '../../shared/constants/index.ts';
import { State, PinType, stateFromBit } from '../signal/state.ts';

export const MEMORY_PINS = {
  CS: 1,
  WE: 2,
  OE: 3,
  A0: 4,
  A1: 5,
  A2: 6,
  A3: 7,
  A4: 8,
  A5: 9,
  A6: 10,
  A7: 12,
  IO0: 13,
  IO1: 14,
  IO2: 15,
  IO3: 16,
  IO4: 17,
  IO5: 18,
  IO6: 19,
  IO7: 20,
  VCC: 22,
  GND: 11,
} as const;

const PIN_COUNT = 22;

/** Address pins, least significant bit first */
const ADDRESS_PINS = [4, 5, 6, 7, 8, 9, 10, 12] as const;

/** Data bus pins, least significant bit first */
const IO_PINS = [13, 14, 15, 16, 17, 18, 19, 20] as const;

function memoryPinTypes(): PinType[] {
  return Array.from({ length: PIN_COUNT }, (_, i) =>
    i + 1 >= MEMORY_PINS.IO0 && i + 1 <= MEMORY_PINS.IO7 ? PinType.Output : PinType.Input,
  );
}

/** Hex dump with a column header, one row of 16 bytes per line */
export function hexDump(bytes: Uint8Array): string {
  const columns = Array.from({ length: MEMORY_CONFIG.DUMP_ROW_LENGTH }, (_, i) => toHex(i)).join(' ');
  const lines = [`ADR| ${columns}`, `---+${'-'.repeat(MEMORY_CONFIG.DUMP_ROW_LENGTH * 3)}`];
  for (let row = 0; row < bytes.length; row += MEMORY_CONFIG.DUMP_ROW_LENGTH) {
    const cells = Array.from(bytes.subarray(row, row + MEMORY_CONFIG.DUMP_ROW_LENGTH), toHex);
    lines.push(` ${toHex(row)}| ${cells.join(' ')}`);
  }
  return lines.join('\n');
}

function toHex(byte: number): string {
  return byte.toString(16).toUpperCase().padStart(2, '0');
}

const HEX_CONTENTS = new RegExp(`^[0-9a-fA-F]{${MEMORY_CONFIG.SIZE * 2}}$`);

function decodeContents(hex: string | undefined): Uint8Array | null {
  if (hex === undefined || !HEX_CONTENTS.test(hex)) return null;
  return new Uint8Array(Buffer.from(hex, 'hex'));
}

function encodeContents(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

// =============================================================================
// Shared memory behaviour
// =============================================================================

abstract class MemoryChip extends BaseChip {
  protected readonly memory = new Uint8Array(MEMORY_CONFIG.SIZE);

  protected constructor() {
    super(memoryPinTypes());
  }

  /** Current contents, copied */
  get contents(): Uint8Array {
    return this.memory.slice();
  }

  protected isSelected(): boolean {
    return this.read(MEMORY_PINS.CS) === State.Low;
  }

  protected isAsserted(pin: number): boolean {
    return this.read(pin) === State.Low;
  }

  /** Address bits read from the address pins; anything but High counts as 0 */
  protected address(): number {
    return ADDRESS_PINS.reduce(
      (addr, pin, bit) => (this.read(pin) === State.High ? addr | (1 << bit) : addr),
      0,
    );
  }

  protected dataBus(): number {
    return IO_PINS.reduce(
      (byte, pin, bit) => (this.read(pin) === State.High ? byte | (1 << bit) : byte),
      0,
    );
  }

  protected setBusType(type: PinType): void {
    this.setType(IO_PINS, type);
  }

  protected driveBus(byte: number): void {
    IO_PINS.forEach((pin, bit) => this.write(pin, stateFromBit(byte, bit)));
  }

  /** Put the byte at the current address onto the data bus */
  protected output(): void {
    this.setBusType(PinType.Output);
    this.driveBus(this.memory[this.address()]);
  }

  protected hasPower(): boolean {
    return this.isPowered(MEMORY_PINS.GND, MEMORY_PINS.VCC);
  }

  protected invalidData(message: string): Result<void, ChipDataError> {
    return err({ kind: 'invalid-chip-data', message, chipType: this.type });
  }
}

// =============================================================================
// RAM
// =============================================================================

/**
 * 256-byte RAM. Contents are random after every power-up and are lost when
 * power goes away.
 */
export class Ram256 extends MemoryChip {
  static readonly TYPE = 'ram-256b';
  readonly type = Ram256.TYPE;
  private powered = false;

  constructor() {
    super();
  }

  /** Whether the chip has seen power since it was last switched off */
  get isPoweredUp(): boolean {
    return this.powered;
  }

  run(_elapsed: number): void {
    if (!this.hasPower()) {
      if (this.powered) {
        this.forceAll(State.Undefined);
        this.powered = false;
      }
      return;
    }

    if (!this.powered) {
      for (let i = 0; i < this.memory.length; i++) {
        this.memory[i] = Math.floor(Math.random() * 256);
      }
      this.powered = true;
    }

    if (!this.isSelected()) {
      this.setBusType(PinType.Undefined);
      return;
    }

    if (this.isAsserted(MEMORY_PINS.WE)) {
      this.setBusType(PinType.Input);
      this.memory[this.address()] = this.dataBus();
    }

    if (this.isAsserted(MEMORY_PINS.OE)) {
      this.output();
    }
  }

  info(): ChipInfo {
    return {
      name: 'Ram 256 Bytes',
      description:
        'A Random Access Memory Chip that can contain 256 Bytes of data.\nThe data is not kept if the chip is no longer powered.',
      data: hexDump(this.memory),
    };
  }

  saveData(): string[] {
    return [encodeContents(this.memory), this.powered ? 'on' : 'off'];
  }

  loadData(data: readonly string[]): Result<void, ChipDataError> {
    const contents = decodeContents(data[0]);
    if (!contents) {
      return this.invalidData(`Expected ${MEMORY_CONFIG.SIZE} bytes of hex contents`);
    }
    const flag = data[1];
    if (flag !== 'on' && flag !== 'off') {
      return this.invalidData(`Expected power flag "on" or "off", got ${JSON.stringify(flag)}`);
    }
    this.memory.set(contents);
    this.powered = flag === 'on';
    return ok(undefined);
  }
}

// =============================================================================
// ROM
// =============================================================================

/** 256-byte ROM. Contents survive power loss and cannot be changed through the pins. */
export class Rom256 extends MemoryChip {
  static readonly TYPE = 'rom-256b';
  readonly type = Rom256.TYPE;

  /** `data` is copied from address 0; bytes beyond 256 are ignored */
  constructor(data?: ArrayLike<number>) {
    super();
    if (data) this.program(data);
  }

  /** Replace the contents, starting at address 0 */
  program(data: ArrayLike<number>): void {
    const length = Math.min(data.length, this.memory.length);
    for (let i = 0; i < length; i++) {
      this.memory[i] = data[i] & 0xff;
    }
  }

  run(_elapsed: number): void {
    if (!this.hasPower()) {
      this.forceAll(State.Undefined);
      return;
    }

    if (!this.isSelected()) {
      this.setBusType(PinType.Undefined);
      return;
    }

    if (this.isAsserted(MEMORY_PINS.OE)) {
      this.output();
    }
  }

  info(): ChipInfo {
    return {
      name: 'Rom 256 Bytes',
      description:
        'A Read Only Memory Chip that can contain 256 Bytes of data.\nThe data is kept if the chip is no longer powered.',
      data: hexDump(this.memory),
    };
  }

  saveData(): string[] {
    return [encodeContents(this.memory)];
  }

  loadData(data: readonly string[]): Result<void, ChipDataError> {
    const contents = decodeContents(data[0]);
    if (!contents) {
      return this.invalidData(`Expected ${MEMORY_CONFIG.SIZE} bytes of hex contents`);
    }
    this.memory.set(contents);
    return ok(undefined);
  }
}
