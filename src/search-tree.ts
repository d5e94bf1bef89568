import { IllegalMoveError, InvalidStateError } from './errors.js';
import { Scorer } from './modular/scoring.js';
import { SearchNode } from './search-node.js';
import { GameAdapter } from './search-types.js';
import { AddResult, TranspositionTable } from './transposition-table.js';
import { containsMove } from './utils/move-utils.js';

/**
 * The state one search session works on: the transposition table, the node
 * of the live position, and the hooks that keep scores consistent while the
 * table grows.
 *
 * Expansion strategies, controls and pruning policies all operate on a
 * SearchTree. It has a single writer (the engine driving the session).
 */
export class SearchTree<State, Move, Player extends PropertyKey> {
    readonly table = new TranspositionTable<State, Move, Player>();

    private currentNode: SearchNode<State, Move, Player>;

    constructor(
        readonly adapter: GameAdapter<State, Move, Player>,
        private readonly scorer: Scorer<State, Move, Player>,
        startingState: State = adapter.startingState(),
    ) {
        this.currentNode = this.addNode(new SearchNode(adapter, startingState)).node;
    }

    get current(): SearchNode<State, Move, Player> {
        return this.currentNode;
    }

    get size(): number {
        return this.table.size;
    }

    /**
     * Routes a node through the transposition table and re-scores whatever changed.
     */
    addNode(node: SearchNode<State, Move, Player>): AddResult<State, Move, Player> {
        const result = this.table.addOrMerge(node);
        if (result.changed) {
            this.rescore(result.node.key);
        }
        return result;
    }

    /**
     * Expands a single node and registers every produced successor.
     *
     * POSTCONDITION:
     * - node.isExpanded is true
     * - every successor key is resident in the table
     * - the node and everything that leads to it are re-scored
     *
     * @throws InvalidStateError if the node was already expanded
     */
    expandNode(node: SearchNode<State, Move, Player>): void {
        const produced = node.expand();
        for (const { node: successor } of produced) {
            this.addNode(successor);
        }
        this.table.linkSuccessors(node.key, node.successorKeys());

        // Post-expansion hook: merges above may have brought in scores from other paths
        this.rescore(node.key);
    }

    /**
     * Re-scores a node and keeps walking up the predecessor relation for as
     * long as scores keep changing.
     */
    rescore(key: string): void {
        const pending = [ key ];
        while (pending.length > 0) {
            const nextKey = pending.pop();
            const node = nextKey === undefined ? undefined : this.table.get(nextKey);
            if (node === undefined) {
                continue;
            }
            const changed = node.applyEvaluation(this.scorer.evaluate(node, this.table));
            if (changed) {
                pending.push(...this.table.predecessorsOf(node.key));
            }
        }
    }

    /**
     * Moves the current node along the given move, expanding it first if needed.
     *
     * @throws IllegalMoveError if the move is not legal in the current position;
     *   the table and the current node are left untouched
     */
    advance(move: Move): SearchNode<State, Move, Player> {
        const legalMoves = this.adapter.allLegalMoves(this.currentNode.state);
        if (!containsMove(legalMoves, move)) {
            throw new IllegalMoveError(`Illegal move ${JSON.stringify(move)} in state ${this.currentNode.key}`);
        }

        if (!this.currentNode.isExpanded) {
            this.expandNode(this.currentNode);
        }

        const key = this.currentNode.successorFor(move);
        const next = key === undefined ? undefined : this.table.get(key);
        if (next === undefined) {
            throw new InvalidStateError(`Successor for move ${JSON.stringify(move)} of ${this.currentNode.key} is missing from the table`);
        }
        this.currentNode = next;
        return next;
    }
}
