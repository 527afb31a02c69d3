import type { SocketId } from '../../shared/types/index.ts';
import type { Result } from '../../shared/result/index.ts';
import { err } from '../../shared/result/index.ts';
import { generateId } from '../../shared/generate-id.ts';
import type { Chip, PinOutOfBoundsError } from '../chips/framework.ts';
import type { Pin } from '../signal/pin.ts';

export interface SocketEmptyError {
  kind: 'socket-empty';
  message: string;
  socketId: SocketId;
}

/** A mount point holding at most one chip. */
export class Socket {
  /** Stable for the socket's lifetime, whatever is plugged into it */
  readonly id: SocketId = generateId();
  private occupant: Chip | null = null;

  get chip(): Chip | null {
    return this.occupant;
  }

  /** Mount `chip`, dropping any previous occupant */
  plug(chip: Chip): void {
    this.occupant = chip;
  }

  /** Remove and return the occupant */
  unplug(): Chip | null {
    const chip = this.occupant;
    this.occupant = null;
    return chip;
  }

  /** Pin of the plugged chip */
  pin(index: number): Result<Pin, PinOutOfBoundsError | SocketEmptyError> {
    if (!this.occupant) {
      return err({
        kind: 'socket-empty',
        message: `Socket ${this.id} has no chip`,
        socketId: this.id,
      });
    }
    return this.occupant.pin(index);
  }

  run(elapsed: number): void {
    this.occupant?.run(elapsed);
  }
}
