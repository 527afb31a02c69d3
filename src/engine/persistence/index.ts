export type { SavedBoard, SavedSocket, SavedChip, SavedTrace, InvalidInputError } from './board-codec.ts';
export { serializeBoard, deserializeBoard, stringifyBoard, parseBoard } from './board-codec.ts';
export type { BoardIoError, BoardLoadError } from './board-file.ts';
export { saveBoard, loadBoard } from './board-file.ts';
