export * from './engine/signal/index.ts';
export * from './engine/chips/index.ts';
export * from './engine/board/index.ts';
export * from './engine/persistence/index.ts';
export type { ChipId, SocketId, PinRef, RunSummary } from './shared/types/index.ts';
export type { Result } from './shared/result/index.ts';
export { ok, err } from './shared/result/index.ts';
export type { Logger, LogLevel, LogContext } from './shared/logger/index.ts';
export { createLogger, setLogLevel, getLogLevel } from './shared/logger/index.ts';
export { SIMULATION_CONFIG, MEMORY_CONFIG, PERSISTENCE_CONFIG, LOG_CONFIG } from './shared/constants/index.ts';
export type { SimulationStore } from './store/simulation-store.ts';
export { createSimulationStore } from './store/simulation-store.ts';
export type { SimulationSlice } from './store/slices/simulation-slice.ts';
