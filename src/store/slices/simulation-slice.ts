import type { StateCreator } from 'zustand/vanilla';

export interface SimulationSlice {
  /** Ticks run since creation or the last reset */
  tickCount: number;
  /** Simulated time accumulated over those ticks, in milliseconds */
  elapsed: number;
  /** `dt` of the most recent tick */
  lastStep: number;
  /** True while a multi-tick loop is executing */
  running: boolean;

  recordTick: (dt: number) => void;
  setRunning: (running: boolean) => void;
  reset: () => void;
}

const INITIAL = {
  tickCount: 0,
  elapsed: 0,
  lastStep: 0,
  running: false,
} as const;

export const createSimulationSlice: StateCreator<SimulationSlice> = (set) => ({
  ...INITIAL,

  recordTick: (dt) =>
    set((s) => ({
      tickCount: s.tickCount + 1,
      elapsed: s.elapsed + dt,
      lastStep: dt,
    })),

  setRunning: (running) => set({ running }),

  reset: () => set({ ...INITIAL }),
});
