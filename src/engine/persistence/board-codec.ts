/**
 * Saved board format.
 *
 * Sockets are stored in board order with the chip they hold; traces are
 * stored as (chip id, pin) references. Socket ids are not stored. Loading
 * builds fresh chips through a caller-supplied factory, so chip ids change
 * and trace references are remapped to the new chips.
 */

import type { ChipId, PinRef } from '../../shared/types/index.ts';
import type { Result } from '../../shared/result/index.ts';
import { ok, err } from '../../shared/result/index.ts';
import { PERSISTENCE_CONFIG } from '../../shared/constants/index.ts';
import { createLogger } from '../../shared/logger/index.ts';
import { Board } from '../board/board.ts';
import type { Chip, ChipFactory } from '../chips/framework.ts';

const log = createLogger('BoardCodec');

// --- Serialized types ---

export interface SavedChip {
  id: ChipId;
  type: string;
  data: string[];
}

export interface SavedSocket {
  chip: SavedChip | null;
}

export interface SavedTrace {
  pins: PinRef[];
}

export interface SavedBoard {
  version: number;
  sockets: SavedSocket[];
  traces: SavedTrace[];
}

export interface InvalidInputError {
  kind: 'invalid-input';
  message: string;
}

function invalid(message: string): Result<never, InvalidInputError> {
  return err({ kind: 'invalid-input', message });
}

// --- Serialization ---

/**
 * Snapshot a board. Only chips currently plugged in are written, each once:
 * a chip mounted in a second socket leaves that socket empty, and trace pins
 * of chips that are not plugged in anywhere are left out.
 */
export function serializeBoard(board: Board): SavedBoard {
  const saved = new Set<ChipId>();
  const sockets = board.sockets.map((socket): SavedSocket => {
    const chip = socket.chip;
    if (!chip || saved.has(chip.id)) return { chip: null };
    saved.add(chip.id);
    return { chip: { id: chip.id, type: chip.type, data: chip.saveData() } };
  });

  return {
    version: PERSISTENCE_CONFIG.SCHEMA_VERSION,
    sockets,
    traces: board.traces.map((trace) => ({
      pins: trace.save().filter((ref) => saved.has(ref.chipId)),
    })),
  };
}

export function stringifyBoard(board: Board): string {
  return JSON.stringify(serializeBoard(board), null, PERSISTENCE_CONFIG.JSON_INDENT);
}

// --- Shape guards (data comes from disk) ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isSavedChip(value: unknown): value is SavedChip {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.type === 'string' &&
    isStringArray(value.data)
  );
}

function isPinRef(value: unknown): value is PinRef {
  return isRecord(value) && typeof value.chipId === 'string' && Number.isInteger(value.pin);
}

// --- Deserialization ---

/**
 * Rebuild a board from its saved form.
 *
 * A chip type the factory does not know leaves its socket empty, and trace
 * references to that chip are dropped. Anything structurally wrong fails
 * with `invalid-input`.
 */
export function deserializeBoard(
  data: unknown,
  factory: ChipFactory,
): Result<Board, InvalidInputError> {
  if (!isRecord(data)) return invalid('Saved board must be an object');
  if (data.version !== PERSISTENCE_CONFIG.SCHEMA_VERSION) {
    return invalid(`Unsupported saved board version: ${JSON.stringify(data.version)}`);
  }
  if (!Array.isArray(data.sockets)) return invalid('Saved board is missing its sockets');
  if (!Array.isArray(data.traces)) return invalid('Saved board is missing its traces');

  const sockets: readonly unknown[] = data.sockets;
  const traces: readonly unknown[] = data.traces;
  const board = new Board();
  const chips = new Map<ChipId, Chip>();
  const dropped = new Set<ChipId>();

  for (const [i, saved] of sockets.entries()) {
    if (!isRecord(saved) || !('chip' in saved)) return invalid(`Socket ${i} is malformed`);
    const socket = board.newSocket();
    if (saved.chip === null) continue;
    if (!isSavedChip(saved.chip)) return invalid(`Chip in socket ${i} is malformed`);

    const { id, type, data: chipData } = saved.chip;
    if (chips.has(id) || dropped.has(id)) return invalid(`Chip id ${id} appears twice`);

    const chip = factory(type);
    if (!chip) {
      log.warn('Unknown chip type, leaving socket empty', { socket: i, type });
      dropped.add(id);
      continue;
    }
    const loaded = chip.loadData(chipData);
    if (!loaded.ok) return invalid(`Chip in socket ${i}: ${loaded.error.message}`);

    socket.plug(chip);
    chips.set(id, chip);
  }

  for (const [i, saved] of traces.entries()) {
    if (!isRecord(saved) || !Array.isArray(saved.pins)) return invalid(`Trace ${i} is malformed`);
    const trace = board.newTrace();
    const refs: readonly unknown[] = saved.pins;
    for (const ref of refs) {
      if (!isPinRef(ref)) return invalid(`Trace ${i} has a malformed pin reference`);
      if (dropped.has(ref.chipId)) continue;
      const chip = chips.get(ref.chipId);
      if (!chip) return invalid(`Trace ${i} references unknown chip ${ref.chipId}`);
      const pin = chip.pin(ref.pin);
      if (!pin.ok) return invalid(`Trace ${i}: ${pin.error.message}`);
      trace.connect(pin.value);
    }
  }

  return ok(board);
}

export function parseBoard(json: string, factory: ChipFactory): Result<Board, InvalidInputError> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e) {
    return invalid(`Saved board is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return deserializeBoard(data, factory);
}
