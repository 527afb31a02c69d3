import { describe, it, expect, vi, afterEach } from 'vitest';
import { Ram256, Rom256, MEMORY_PINS, hexDump } from './memory.ts';
import type { Chip } from './framework.ts';
import type { Pin } from '../signal/pin.ts';
import { State, PinType } from '../signal/state.ts';

const ADDRESS = [
  MEMORY_PINS.A0, MEMORY_PINS.A1, MEMORY_PINS.A2, MEMORY_PINS.A3,
  MEMORY_PINS.A4, MEMORY_PINS.A5, MEMORY_PINS.A6, MEMORY_PINS.A7,
];
const IO = [
  MEMORY_PINS.IO0, MEMORY_PINS.IO1, MEMORY_PINS.IO2, MEMORY_PINS.IO3,
  MEMORY_PINS.IO4, MEMORY_PINS.IO5, MEMORY_PINS.IO6, MEMORY_PINS.IO7,
];

function pinOf(chip: Chip, index: number): Pin {
  const result = chip.pin(index);
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
}

function set(chip: Chip, index: number, state: State): void {
  pinOf(chip, index).state = state;
}

function setByte(chip: Chip, pins: readonly number[], byte: number): void {
  pins.forEach((pin, bit) => set(chip, pin, (byte >> bit) & 1 ? State.High : State.Low));
}

function readByte(chip: Chip, pins: readonly number[]): number {
  return pins.reduce((byte, pin, bit) => (pinOf(chip, pin).state === State.High ? byte | (1 << bit) : byte), 0);
}

function powerUp(chip: Chip): void {
  set(chip, MEMORY_PINS.GND, State.Low);
  set(chip, MEMORY_PINS.VCC, State.High);
}

function writeCycle(ram: Ram256, address: number, byte: number): void {
  set(ram, MEMORY_PINS.CS, State.Low);
  set(ram, MEMORY_PINS.WE, State.Low);
  set(ram, MEMORY_PINS.OE, State.High);
  setByte(ram, ADDRESS, address);
  setByte(ram, IO, byte);
  ram.run(1);
}

function readCycle(chip: Chip, address: number): number {
  set(chip, MEMORY_PINS.CS, State.Low);
  set(chip, MEMORY_PINS.WE, State.High);
  set(chip, MEMORY_PINS.OE, State.Low);
  setByte(chip, ADDRESS, address);
  chip.run(1);
  return readByte(chip, IO);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Ram256', () => {
  it('has 22 pins with the data bus as outputs', () => {
    const ram = new Ram256();
    expect(ram.pinCount).toBe(22);
    expect(ram.type).toBe('ram-256b');
    for (let pin = 1; pin <= 22; pin++) {
      const expected = pin >= 13 && pin <= 20 ? PinType.Output : PinType.Input;
      expect(pinOf(ram, pin).type).toBe(expected);
    }
  });

  it('reads back a byte written at every address', () => {
    const ram = new Ram256();
    powerUp(ram);
    for (let address = 0; address < 256; address++) {
      writeCycle(ram, address, (address * 31 + 7) & 0xff);
    }
    for (let address = 0; address < 256; address++) {
      expect(readCycle(ram, address)).toBe((address * 31 + 7) & 0xff);
    }
  });

  it('stores every byte value at every address', () => {
    const ram = new Ram256();
    powerUp(ram);
    const mismatches: string[] = [];
    for (let address = 0; address < 256; address++) {
      for (let byte = 0; byte < 256; byte++) {
        writeCycle(ram, address, byte);
        const read = readCycle(ram, address);
        if (read !== byte) mismatches.push(`${address}: wrote ${byte}, read ${read}`);
      }
    }
    expect(mismatches).toEqual([]);
  }, 60_000);

  it('keeps other addresses intact when writing', () => {
    const ram = new Ram256();
    powerUp(ram);
    writeCycle(ram, 0x10, 0xaa);
    writeCycle(ram, 0x11, 0x55);
    expect(readCycle(ram, 0x10)).toBe(0xaa);
    expect(readCycle(ram, 0x11)).toBe(0x55);
  });

  it('uses pin 12 as the most significant address bit', () => {
    const ram = new Ram256();
    powerUp(ram);
    writeCycle(ram, 0x80, 0x42);
    expect(ram.contents[0x80]).toBe(0x42);
  });

  it('switches the data bus to Input while writing and Output while reading', () => {
    const ram = new Ram256();
    powerUp(ram);
    writeCycle(ram, 3, 7);
    for (const pin of IO) expect(pinOf(ram, pin).type).toBe(PinType.Input);
    readCycle(ram, 3);
    for (const pin of IO) expect(pinOf(ram, pin).type).toBe(PinType.Output);
  });

  it('floats the data bus when not selected', () => {
    const ram = new Ram256();
    powerUp(ram);
    set(ram, MEMORY_PINS.CS, State.High);
    set(ram, MEMORY_PINS.OE, State.Low);
    ram.run(1);
    for (const pin of IO) expect(pinOf(ram, pin).type).toBe(PinType.Undefined);
  });

  it('ignores writes when not selected', () => {
    const ram = new Ram256();
    powerUp(ram);
    writeCycle(ram, 9, 0x11);
    set(ram, MEMORY_PINS.CS, State.High);
    set(ram, MEMORY_PINS.WE, State.Low);
    setByte(ram, IO, 0x99);
    ram.run(1);
    expect(ram.contents[9]).toBe(0x11);
  });

  it('randomizes its contents on the first powered tick only', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    const ram = new Ram256();
    expect(ram.isPoweredUp).toBe(false);

    powerUp(ram);
    set(ram, MEMORY_PINS.CS, State.High);
    ram.run(1);
    expect(ram.isPoweredUp).toBe(true);
    expect(ram.contents.every((b) => b === 128)).toBe(true);

    writeCycle(ram, 0, 1);
    ram.run(1);
    expect(ram.contents[0]).toBe(1);
    expect(Math.random).toHaveBeenCalledTimes(256);
  });

  it('forces every pin Undefined on power loss and re-randomizes on the next power-up', () => {
    const random = vi.spyOn(Math, 'random').mockReturnValue(0);
    const ram = new Ram256();
    powerUp(ram);
    writeCycle(ram, 5, 0xff);

    set(ram, MEMORY_PINS.VCC, State.Low);
    ram.run(1);
    expect(ram.isPoweredUp).toBe(false);
    for (let pin = 1; pin <= 22; pin++) {
      expect(pinOf(ram, pin).state).toBe(State.Undefined);
    }

    powerUp(ram);
    set(ram, MEMORY_PINS.CS, State.High);
    ram.run(1);
    expect(ram.isPoweredUp).toBe(true);
    expect(ram.contents[5]).toBe(0);
    expect(random).toHaveBeenCalledTimes(512);
  });

  it('does nothing while it has never been powered', () => {
    const ram = new Ram256();
    set(ram, MEMORY_PINS.CS, State.Low);
    set(ram, MEMORY_PINS.OE, State.Low);
    ram.run(1);
    expect(ram.isPoweredUp).toBe(false);
    expect(pinOf(ram, MEMORY_PINS.CS).state).toBe(State.Low);
  });

  it('round-trips its contents and power flag through saveData', () => {
    const ram = new Ram256();
    powerUp(ram);
    writeCycle(ram, 0, 0xab);
    writeCycle(ram, 255, 0x01);

    const data = ram.saveData();
    expect(data).toHaveLength(2);
    expect(data[0]).toHaveLength(512);
    expect(data[0].slice(0, 2)).toBe('ab');
    expect(data[1]).toBe('on');

    const copy = new Ram256();
    expect(copy.loadData(data).ok).toBe(true);
    expect(copy.contents).toEqual(ram.contents);
    expect(copy.isPoweredUp).toBe(true);
  });

  const invalidData: [string, string[]][] = [
    ['missing contents', []],
    ['short contents', ['00', 'on']],
    ['non-hex contents', ['zz'.repeat(256), 'on']],
    ['bad power flag', ['00'.repeat(256), 'maybe']],
  ];

  it.each(invalidData)('rejects %s', (_label, data) => {
    const result = new Ram256().loadData(data);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('invalid-chip-data');
    expect(result.error.chipType).toBe('ram-256b');
  });
});

describe('Rom256', () => {
  const image = Array.from({ length: 256 }, (_, i) => (i * 7 + 3) & 0xff);

  it('reads the preloaded value at every address', () => {
    const rom = new Rom256(image);
    powerUp(rom);
    for (let address = 0; address < 256; address++) {
      expect(readCycle(rom, address)).toBe(image[address]);
    }
  });

  it('cannot be written through its pins', () => {
    const rom = new Rom256(image);
    powerUp(rom);
    set(rom, MEMORY_PINS.CS, State.Low);
    set(rom, MEMORY_PINS.WE, State.Low);
    set(rom, MEMORY_PINS.OE, State.High);
    setByte(rom, ADDRESS, 4);
    setByte(rom, IO, 0x00);
    rom.run(1);
    expect(Array.from(rom.contents)).toEqual(image);
  });

  it('keeps its contents through power loss but forces pins Undefined', () => {
    const rom = new Rom256(image);
    set(rom, MEMORY_PINS.GND, State.High);
    set(rom, MEMORY_PINS.VCC, State.High);
    rom.run(1);
    for (let pin = 1; pin <= 22; pin++) {
      expect(pinOf(rom, pin).state).toBe(State.Undefined);
    }
    powerUp(rom);
    expect(readCycle(rom, 10)).toBe(image[10]);
  });

  it('floats the data bus when not selected', () => {
    const rom = new Rom256(image);
    powerUp(rom);
    set(rom, MEMORY_PINS.CS, State.High);
    rom.run(1);
    for (const pin of IO) expect(pinOf(rom, pin).type).toBe(PinType.Undefined);
  });

  it('programs from address 0 and ignores extra bytes', () => {
    const rom = new Rom256();
    rom.program([1, 2, 3]);
    expect(Array.from(rom.contents.slice(0, 4))).toEqual([1, 2, 3, 0]);
    rom.program(new Array<number>(300).fill(9));
    expect(rom.contents.every((b) => b === 9)).toBe(true);
  });

  it('round-trips its contents through saveData', () => {
    const rom = new Rom256(image);
    const copy = new Rom256();
    expect(copy.loadData(rom.saveData()).ok).toBe(true);
    expect(copy.contents).toEqual(rom.contents);
    expect(copy.loadData(['nope']).ok).toBe(false);
  });
});

describe('hexDump', () => {
  it('renders a header and 16 rows of 16 bytes', () => {
    const bytes = new Uint8Array(256);
    bytes[0x00] = 0x0f;
    bytes[0xff] = 0xa0;
    const lines = hexDump(bytes).split('\n');
    expect(lines).toHaveLength(18);
    expect(lines[0]).toBe('ADR| 00 01 02 03 04 05 06 07 08 09 0A 0B 0C 0D 0E 0F');
    expect(lines[1]).toBe(`---+${'-'.repeat(48)}`);
    expect(lines[2]).toBe(` 00| 0F${' 00'.repeat(15)}`);
    expect(lines[17]).toBe(` F0|${' 00'.repeat(15)} A0`);
  });

  it('backs the info data of memory chips', () => {
    const rom = new Rom256([0xff]);
    expect(rom.info().name).toBe('Rom 256 Bytes');
    expect(rom.info().data.split('\n')[2].startsWith(' 00| FF 00')).toBe(true);
  });
});
