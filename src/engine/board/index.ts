export { Board } from './board.ts';
export type { Clock } from './board.ts';
export { Socket } from './socket.ts';
export type { SocketEmptyError } from './socket.ts';
export { Trace, resolveBus } from './trace.ts';
