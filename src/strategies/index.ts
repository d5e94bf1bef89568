export type { MoveSelector } from './move-selector.js';
export { bestMoveCandidates } from './move-selector.js';
export { FirstMoveSelector } from './first-move-selector.js';
export { RandomMoveSelector } from './random-move-selector.js';
export { RandomBestMoveSelector } from './random-best-move-selector.js';
