export { State, PinType, stateFromBit } from './state.ts';
export { Pin } from './pin.ts';
