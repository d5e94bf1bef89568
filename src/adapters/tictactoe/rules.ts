/**
 * Tic-tac-toe rules as plain functions over immutable states.
 *
 * Coordinates are [x, y] with x the column and y the row, both 0..2.
 * Cells are stored x-major: index = x * 3 + y.
 */

import { IllegalMoveError, InvalidStateError } from '../../errors.js';

export const PLAYER_X = 'X';
export const PLAYER_O = 'O';

export type Player = typeof PLAYER_X | typeof PLAYER_O;

export type Cell = Player | null;

export type Coord = readonly [x: number, y: number];

export type TicTacToeState = {
    /** Nine cells, x-major */
    readonly board: readonly Cell[];

    /** Player to move, null once the game is finished */
    readonly activePlayer: Player | null;
};

export const BOARD_SIZE = 3;

const ALL_COORDS: readonly Coord[] = Array.from({ length: BOARD_SIZE * BOARD_SIZE }, (_, index): Coord => [ Math.floor(index / BOARD_SIZE), index % BOARD_SIZE ]);

const LINES: readonly (readonly Coord[])[] = [
    // rows
    ...[ 0, 1, 2 ].map(y => [ 0, 1, 2 ].map((x): Coord => [ x, y ])),
    // columns
    ...[ 0, 1, 2 ].map(x => [ 0, 1, 2 ].map((y): Coord => [ x, y ])),
    [ 0, 1, 2 ].map((b): Coord => [ b, b ]),
    [ 0, 1, 2 ].map((b): Coord => [ b, 2 - b ]),
];

export function cellIndex([ x, y ]: Coord): number {
    return x * BOARD_SIZE + y;
}

export function isOnBoard(coord: Coord): boolean {
    return coord.length === 2
        && coord.every(value => Number.isInteger(value) && value >= 0 && value < BOARD_SIZE);
}

export function cellAt(state: TicTacToeState, coord: Coord): Cell {
    return state.board[cellIndex(coord)];
}

export function playerSymbol(cell: Cell): string {
    return cell ?? '-';
}

export function startingState(): TicTacToeState {
    return {
        board: Array.from({ length: BOARD_SIZE * BOARD_SIZE }, (): Cell => null),
        activePlayer: PLAYER_X,
    };
}

export function isWinner(state: TicTacToeState, player: Player): boolean {
    return LINES.some(line => line.every(coord => cellAt(state, coord) === player));
}

export function isFinished(state: TicTacToeState): boolean {
    return isWinner(state, PLAYER_X)
        || isWinner(state, PLAYER_O)
        || state.board.every(cell => cell !== null);
}

/**
 * @throws InvalidStateError if the game is not finished
 */
export function winner(state: TicTacToeState): Player | null {
    if (isWinner(state, PLAYER_X)) {
        return PLAYER_X;
    }
    if (isWinner(state, PLAYER_O)) {
        return PLAYER_O;
    }
    if (!isFinished(state)) {
        throw new InvalidStateError('The game is not finished yet');
    }
    return null;
}

export function isLegalMove(state: TicTacToeState, coord: Coord): boolean {
    return isOnBoard(coord) && !isFinished(state) && cellAt(state, coord) === null;
}

/**
 * @throws IllegalMoveError for off-board or occupied cells, and on finished games
 */
export function makeMove(state: TicTacToeState, coord: Coord): TicTacToeState {
    if (!isLegalMove(state, coord)) {
        throw new IllegalMoveError(`Illegal move ${JSON.stringify(coord)}`);
    }

    const board = [ ...state.board ];
    board[cellIndex(coord)] = state.activePlayer;
    const tentative: TicTacToeState = { board, activePlayer: null };
    if (isFinished(tentative)) {
        return tentative;
    }
    return { board, activePlayer: state.activePlayer === PLAYER_X ? PLAYER_O : PLAYER_X };
}

export function allLegalMoves(state: TicTacToeState): Coord[] {
    return ALL_COORDS.filter(coord => isLegalMove(state, coord));
}

/**
 * Zero-sum result of a finished game, undefined while it is still running.
 */
export function evaluate(state: TicTacToeState): Record<Player, number> | undefined {
    if (!isFinished(state)) {
        return undefined;
    }
    if (isWinner(state, PLAYER_X)) {
        return { X: 1, O: -1 };
    }
    if (isWinner(state, PLAYER_O)) {
        return { X: -1, O: 1 };
    }
    return { X: 0, O: 0 };
}

/**
 * Nine cell symbols (x-major) plus the player to move, e.g. `----X----:O`.
 */
export function nodeKey(state: TicTacToeState): string {
    return `${state.board.map(playerSymbol).join('')}:${playerSymbol(state.activePlayer)}`;
}

export function textualRepr(state: TicTacToeState): string {
    const row = (y: number) => ` ${[ 0, 1, 2 ].map(x => playerSymbol(cellAt(state, [ x, y ])).replace('-', ' ')).join(' | ')}`;
    const status = isFinished(state)
        ? `Winner: ${playerSymbol(winner(state))}`
        : `Move: ${playerSymbol(state.activePlayer)}`;
    return [ row(0), '---+---+---', row(1), '---+---+---', row(2), status ].join('\n');
}
