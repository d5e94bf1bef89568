/**
 * Per-player result of a position, e.g. `{ X: 1, O: -1 }`.
 * For two-player games the values are zero-sum.
 */
export type Scores<Player extends PropertyKey> = Readonly<Record<Player, number>>;

/**
 * GameAdapter encapsulates all game-specific logic the search engine consumes.
 * Generic over State, Move and Player types to work with any turn-based,
 * perfect-information game.
 *
 * The engine never mutates states: every transition goes through makeMove()
 * and returns a new state.
 *
 * Different games plug in differently:
 * - Tic-tac-toe: 3x3 board plus active player, moves are [x, y] cells
 * - Connect four: column heights plus disc layout, moves are column indices
 */
export interface GameAdapter<State, Move, Player extends PropertyKey> {
    startingState(): State;

    /**
     * Player to move, or null once the game is over.
     */
    activePlayer(state: State): Player | null;

    isFinished(state: State): boolean;

    /**
     * All legal moves in a stable order. Empty on finished states.
     * The order is the tie-break order used by FirstMoveSelector.
     */
    allLegalMoves(state: State): Move[];

    /**
     * @throws IllegalMoveError if the move is not legal in this state
     */
    makeMove(state: State, move: Move): State;

    /**
     * @returns The winning player, or null for a draw
     * @throws InvalidStateError if the game is not finished yet
     */
    winner(state: State): Player | null;

    /**
     * Zero-sum evaluation of a state.
     *
     * Finished states must always be evaluated. For unfinished states an adapter
     * may return a heuristic estimate, or undefined for "no result yet" so the
     * state stays out of minimax comparisons until it has been expanded.
     */
    evaluate(state: State): Scores<Player> | undefined;

    /**
     * Canonical transposition key. Two states must produce the same key if and
     * only if they are the same position with the same player to move.
     */
    nodeKey(state: State): string;

    /**
     * Optional human-readable rendering, used for debug output.
     */
    describe?(state: State): string;
}

/**
 * One legal move of an expanded node and the key of the node it leads to.
 */
export type SuccessorEntry<Move> = {
    move: Move;
    key: string;
};

/**
 * Result of scoring a single node.
 */
export type NodeEvaluation<Move, Player extends PropertyKey> = {
    /** Scores for every player, undefined while nothing is known about the node */
    scores: Scores<Player> | undefined;

    /** Moves tied for the best score of the active player, in legal move order */
    bestMoves: readonly Move[];
};
