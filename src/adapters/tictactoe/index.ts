// Tic-tac-toe adapter exports
export { TicTacToeAdapter } from './adapter.js';
export type { Player, Cell, Coord, TicTacToeState } from './rules.js';
export {
    PLAYER_X,
    PLAYER_O,
    startingState,
    isWinner,
    isFinished,
    winner,
    isLegalMove,
    makeMove,
    allLegalMoves,
    evaluate,
    nodeKey,
    textualRepr,
} from './rules.js';
