import { SearchNode } from '../search-node.js';
import { pickRandom } from '../utils/move-utils.js';
import { MoveSelector } from './move-selector.js';

/**
 * Random Move Selector
 *
 * Chooses uniformly at random from all legal moves, ignoring scores.
 *
 * Used for:
 * - Baseline comparison (search vs random)
 * - Random opponents in tests
 */
export class RandomMoveSelector<State, Move, Player extends PropertyKey> implements MoveSelector<State, Move, Player> {
    constructor(private readonly random: () => number = Math.random) {}

    selectMove(node: SearchNode<State, Move, Player>): Move | undefined {
        return pickRandom(node.getSuccessors().map(entry => entry.move), this.random);
    }
}
