import { SearchNode } from '../search-node.js';

/**
 * Generic Move Selector Interface
 *
 * Chooses the move to play from a scored node. Selectors are independent of
 * the scoring: they only read the node's successor entries and its best-move
 * cache, so any selector can be paired with any Scorer.
 */
export interface MoveSelector<State, Move, Player extends PropertyKey> {
    /**
     * @param node - An expanded node
     * @returns The move to play, or undefined if the node has no legal moves
     */
    selectMove(node: SearchNode<State, Move, Player>): Move | undefined;
}

/**
 * Moves a best-move selector may choose from: the moves tied for the best score,
 * or every legal move while no successor has a known score.
 */
export function bestMoveCandidates<State, Move, Player extends PropertyKey>(node: SearchNode<State, Move, Player>): readonly Move[] {
    if (node.bestMoves.length > 0) {
        return node.bestMoves;
    }
    return node.getSuccessors().map(entry => entry.move);
}
