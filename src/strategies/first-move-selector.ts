import { SearchNode } from '../search-node.js';
import { MoveSelector, bestMoveCandidates } from './move-selector.js';

/**
 * Plays the lowest-ordered move achieving the best score. Deterministic.
 */
export class FirstMoveSelector<State, Move, Player extends PropertyKey> implements MoveSelector<State, Move, Player> {
    selectMove(node: SearchNode<State, Move, Player>): Move | undefined {
        return bestMoveCandidates(node)[0];
    }
}
