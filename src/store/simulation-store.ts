import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { createSimulationSlice } from './slices/simulation-slice.ts';
import type { SimulationSlice } from './slices/simulation-slice.ts';

export type SimulationStore = StoreApi<SimulationSlice>;

/** One store per board: observers subscribe to tick progress without polling. */
export function createSimulationStore(): SimulationStore {
  return createStore<SimulationSlice>()((...a) => ({
    ...createSimulationSlice(...a),
  }));
}
