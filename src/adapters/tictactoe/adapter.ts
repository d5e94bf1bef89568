/**
 * Tic-tac-toe GameAdapter
 *
 * Wires the rule functions into the engine's adapter contract.
 */

import type { GameAdapter, Scores } from '../../search-types.js';
import type { Coord, Player, TicTacToeState } from './rules.js';
import {
    allLegalMoves,
    evaluate,
    isFinished,
    makeMove,
    nodeKey,
    startingState,
    textualRepr,
    winner,
} from './rules.js';

export class TicTacToeAdapter implements GameAdapter<TicTacToeState, Coord, Player> {
    startingState(): TicTacToeState {
        return startingState();
    }

    activePlayer(state: TicTacToeState): Player | null {
        return state.activePlayer;
    }

    isFinished(state: TicTacToeState): boolean {
        return isFinished(state);
    }

    allLegalMoves(state: TicTacToeState): Coord[] {
        return allLegalMoves(state);
    }

    makeMove(state: TicTacToeState, move: Coord): TicTacToeState {
        return makeMove(state, move);
    }

    winner(state: TicTacToeState): Player | null {
        return winner(state);
    }

    evaluate(state: TicTacToeState): Scores<Player> | undefined {
        return evaluate(state);
    }

    nodeKey(state: TicTacToeState): string {
        return nodeKey(state);
    }

    describe(state: TicTacToeState): string {
        return textualRepr(state);
    }
}
