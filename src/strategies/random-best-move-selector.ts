import { SearchNode } from '../search-node.js';
import { pickRandom } from '../utils/move-utils.js';
import { MoveSelector, bestMoveCandidates } from './move-selector.js';

/**
 * Chooses uniformly at random among the moves tied for the best score, so an
 * opponent cannot predict which of several equally good moves gets played.
 */
export class RandomBestMoveSelector<State, Move, Player extends PropertyKey> implements MoveSelector<State, Move, Player> {
    constructor(private readonly random: () => number = Math.random) {}

    selectMove(node: SearchNode<State, Move, Player>): Move | undefined {
        return pickRandom(bestMoveCandidates(node), this.random);
    }
}
