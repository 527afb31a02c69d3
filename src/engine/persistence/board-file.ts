import { readFile, writeFile } from 'node:fs/promises';
import type { Result } from '../../shared/result/index.ts';
import { ok, err } from '../../shared/result/index.ts';
import { PERSISTENCE_CONFIG } from '../../shared/constants/index.ts';
import { createLogger } from '../../shared/logger/index.ts';
import type { Board } from '../board/board.ts';
import type { ChipFactory } from '../chips/framework.ts';
import { parseBoard, stringifyBoard } from './board-codec.ts';
import type { InvalidInputError } from './board-codec.ts';

const log = createLogger('BoardFile');

export interface BoardIoError {
  kind: 'io';
  message: string;
  path: string;
}

export type BoardLoadError = BoardIoError | InvalidInputError;

function ioError(path: string, e: unknown): BoardIoError {
  return { kind: 'io', message: e instanceof Error ? e.message : String(e), path };
}

/** Write `board` as JSON to `path`, replacing any existing file. */
export async function saveBoard(board: Board, path: string): Promise<Result<void, BoardIoError>> {
  try {
    await writeFile(path, stringifyBoard(board), PERSISTENCE_CONFIG.ENCODING);
  } catch (e) {
    const error = ioError(path, e);
    log.error('Failed to save board', { path, error: error.message });
    return err(error);
  }
  log.info('Board saved', { path, sockets: board.sockets.length, traces: board.traces.length });
  return ok(undefined);
}

/** Read and rebuild a board saved with `saveBoard`. */
export async function loadBoard(
  path: string,
  factory: ChipFactory,
): Promise<Result<Board, BoardLoadError>> {
  let json: string;
  try {
    json = await readFile(path, PERSISTENCE_CONFIG.ENCODING);
  } catch (e) {
    const error = ioError(path, e);
    log.error('Failed to read board', { path, error: error.message });
    return err(error);
  }

  const result = parseBoard(json, factory);
  if (!result.ok) {
    log.warn('Saved board rejected', { path, error: result.error.message });
  }
  return result;
}
