import { InvalidStateError } from '../errors.js';
import { SearchNode } from '../search-node.js';
import { GameAdapter, NodeEvaluation, Scores } from '../search-types.js';
import { TranspositionTable } from '../transposition-table.js';

/**
 * Computes the evaluation a node should carry given what the table currently knows.
 * The search tree calls this whenever a node is inserted, merged or expanded,
 * and again for every predecessor whose successor's scores changed.
 */
export interface Scorer<State, Move, Player extends PropertyKey> {
    evaluate(node: SearchNode<State, Move, Player>, table: TranspositionTable<State, Move, Player>): NodeEvaluation<Move, Player>;
}

/**
 * Minimax Scoring
 *
 * Backward value propagation over the transposition table.
 *
 * NODE VALUES:
 * - Finished state: the adapter's zero-sum evaluation (must be defined)
 * - Unexpanded state: the adapter's evaluation, which is undefined for
 *   "no result yet" unless the adapter supplies a heuristic
 * - Expanded state: the scores of the successor that maximizes the active
 *   player's score
 *
 * UNSCORED SUCCESSORS:
 * - Rank as a neutral result (unscoredValue, 0 by default): they beat a known
 *   loss and lose to a known win
 * - While one of them ranks among the best moves, the node stays unscored;
 *   its value depends on what expansion has not reached yet
 *
 * Adopting the whole score map of the chosen successor is what makes the
 * opponent's value follow symmetrically in a zero-sum game.
 */
export class MinimaxScorer<State, Move, Player extends PropertyKey> implements Scorer<State, Move, Player> {
    constructor(
        private readonly adapter: GameAdapter<State, Move, Player>,
        private readonly unscoredValue: number = 0,
    ) {}

    evaluate(node: SearchNode<State, Move, Player>, table: TranspositionTable<State, Move, Player>): NodeEvaluation<Move, Player> {
        if (node.isTerminal()) {
            const scores = this.adapter.evaluate(node.state);
            if (scores === undefined) {
                throw new InvalidStateError(`Finished state ${node.key} has no evaluation`);
            }
            return { scores, bestMoves: [] };
        }

        if (!node.isExpanded) {
            return { scores: this.adapter.evaluate(node.state), bestMoves: [] };
        }

        const player = node.activePlayer();
        if (player === null) {
            throw new InvalidStateError(`Unfinished state ${node.key} has no active player`);
        }

        let bestScores: Scores<Player> | undefined;
        let bestValue = -Infinity;
        let bestIncludesUnscored = false;
        const bestMoves: Move[] = [];

        for (const { move, key } of node.getSuccessors()) {
            const scores = table.get(key)?.scores;
            const value = scores === undefined ? this.unscoredValue : scores[player];
            if (value > bestValue) {
                bestValue = value;
                bestScores = scores;
                bestIncludesUnscored = scores === undefined;
                bestMoves.length = 0;
                bestMoves.push(move);
            } else if (value === bestValue) {
                if (scores === undefined) {
                    bestIncludesUnscored = true;
                }
                bestMoves.push(move);
            }
        }

        return {
            scores: bestIncludesUnscored ? undefined : bestScores,
            bestMoves,
        };
    }
}
