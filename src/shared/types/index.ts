/** Unique identifier for a chip instance */
export type ChipId = string;

/** Unique identifier for a socket on a running board */
export type SocketId = string;

/** Reference to a pin by owning chip and 1-based pin index */
export interface PinRef {
  chipId: ChipId;
  pin: number;
}

/** Outcome of a multi-tick board run */
export interface RunSummary {
  /** Number of ticks executed */
  ticks: number;
  /** Sum of every `dt` passed to those ticks, in milliseconds */
  elapsed: number;
}
