import type { RunSummary, SocketId } from '../../shared/types/index.ts';
import { SIMULATION_CONFIG } from '../../shared/constants/index.ts';
import { createLogger } from '../../shared/logger/index.ts';
import { createSimulationStore } from '../../store/simulation-store.ts';
import type { SimulationStore } from '../../store/simulation-store.ts';
import type { Chip } from '../chips/framework.ts';
import { Socket } from './socket.ts';
import { Trace } from './trace.ts';

const log = createLogger('Board');

/** Monotonic clock in milliseconds */
export type Clock = () => number;

/**
 * Owns the sockets and traces of a circuit and steps it through time.
 *
 * Objects returned by `newTrace` / `newSocket` are the ones the board runs,
 * so callers wire them up directly.
 */
export class Board {
  private readonly traceList: Trace[] = [];
  private readonly socketList: Socket[] = [];
  /** Tick progress, updated by every `run` */
  readonly simulation: SimulationStore = createSimulationStore();

  get traces(): readonly Trace[] {
    return this.traceList;
  }

  get sockets(): readonly Socket[] {
    return this.socketList;
  }

  newTrace(): Trace {
    const trace = new Trace();
    this.traceList.push(trace);
    return trace;
  }

  /** An empty socket; plug a chip before wiring its pins */
  newSocket(): Socket {
    const socket = new Socket();
    this.socketList.push(socket);
    return socket;
  }

  newSocketWith(chip: Chip): Socket {
    const socket = this.newSocket();
    socket.plug(chip);
    return socket;
  }

  getSocket(id: SocketId): Socket | undefined {
    return this.socketList.find((socket) => socket.id === id);
  }

  /**
   * One tick: every trace resolves, then every chip runs.
   *
   * Chips see the levels left by the previous tick's chips, so a chain of N
   * combinational chips takes N ticks to settle.
   */
  run(dt: number): void {
    for (const trace of this.traceList) {
      trace.communicate();
    }
    for (const socket of this.socketList) {
      socket.run(dt);
    }
    this.simulation.getState().recordTick(dt);
  }

  /**
   * Tick by `step` while the accumulated time is below `duration`.
   * The check happens before each tick, so the last tick may end past
   * `duration` (10 by 3 runs 4 ticks and ends at 12).
   */
  runDuring(duration: number, step: number): RunSummary {
    if (!(step > 0)) {
      log.warn('runDuring needs a positive step', { duration, step });
      return { ticks: 0, elapsed: 0 };
    }

    const summary: RunSummary = { ticks: 0, elapsed: 0 };
    this.runLoop(() => {
      while (summary.elapsed < duration) {
        this.run(step);
        summary.elapsed += step;
        summary.ticks++;
      }
    });
    log.debug('runDuring complete', { duration, step, ...summary });
    return summary;
  }

  /**
   * Tick as fast as possible for `duration` milliseconds of wall-clock time.
   * Each tick's `dt` is the gap between the two latest clock readings, so the
   * first tick runs with `dt = 0` and later ones with whatever time passed.
   */
  runRealtime(duration: number, now: Clock = SIMULATION_CONFIG.CLOCK): RunSummary {
    const summary: RunSummary = { ticks: 0, elapsed: 0 };
    this.runLoop(() => {
      const start = now();
      let previous = start;
      let current = start;
      while (now() - start <= duration) {
        const dt = current - previous;
        this.run(dt);
        summary.elapsed += dt;
        summary.ticks++;
        previous = current;
        current = now();
      }
    });
    log.debug('runRealtime complete', { duration, ...summary });
    return summary;
  }

  private runLoop(body: () => void): void {
    const { setRunning } = this.simulation.getState();
    setRunning(true);
    try {
      body();
    } finally {
      setRunning(false);
    }
  }
}
