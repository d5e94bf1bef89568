import { InvalidStateError } from './errors.js';
import { GameAdapter, NodeEvaluation, Scores, SuccessorEntry } from './search-types.js';
import { moveId } from './utils/move-utils.js';

/**
 * A node of the search tree, wrapping exactly one game state.
 *
 * Identity is the canonical key of the state. Nodes reference their successors
 * by key only; the transposition table owns every node, so when two paths reach
 * the same state both of them see the single resident instance.
 *
 * LIFECYCLE:
 * 1. Created the first time its state is reached (starting state or expansion)
 * 2. Expanded at most once, which fixes its successor entries
 * 3. Merged in place when another path produces the same key
 * 4. Re-scored by the owning tree whenever its successors' scores change
 * 5. Removed only by pruning the whole table
 */
export class SearchNode<State, Move, Player extends PropertyKey> {
    readonly key: string;

    private expanded = false;

    private successors: SuccessorEntry<Move>[] = [];

    private currentScores: Scores<Player> | undefined = undefined;

    private bestMoveCache: readonly Move[] = [];

    constructor(
        private readonly adapter: GameAdapter<State, Move, Player>,
        readonly state: State,
    ) {
        this.key = adapter.nodeKey(state);
    }

    get isExpanded(): boolean {
        return this.expanded;
    }

    get scores(): Scores<Player> | undefined {
        return this.currentScores;
    }

    /**
     * Moves tied for the best score of the active player, in legal move order.
     * Empty until the node has at least one scored successor.
     */
    get bestMoves(): readonly Move[] {
        return this.bestMoveCache;
    }

    nodeKey(): string {
        return this.key;
    }

    isTerminal(): boolean {
        return this.adapter.isFinished(this.state);
    }

    activePlayer(): Player | null {
        return this.adapter.activePlayer(this.state);
    }

    getSuccessors(): readonly SuccessorEntry<Move>[] {
        return this.successors;
    }

    successorKeys(): string[] {
        return this.successors.map(entry => entry.key);
    }

    /**
     * @returns The key of the node reached by playing the move, if known
     */
    successorFor(move: Move): string | undefined {
        const id = moveId(move);
        return this.successors.find(entry => moveId(entry.move) === id)?.key;
    }

    score(player: Player): number | undefined {
        return this.currentScores?.[player];
    }

    bestMove(): Move | undefined {
        return this.bestMoveCache[0];
    }

    /**
     * Generates every successor of this node.
     *
     * The returned nodes are fresh and not yet resident in any table; the caller
     * must route each of them through the transposition table.
     *
     * @throws InvalidStateError if the node was already expanded
     */
    expand(): { move: Move; node: SearchNode<State, Move, Player> }[] {
        if (this.expanded) {
            throw new InvalidStateError(`Node ${this.key} is already expanded`);
        }

        const produced = this.adapter.allLegalMoves(this.state).map(move => ({
            move,
            node: new SearchNode(this.adapter, this.adapter.makeMove(this.state, move)),
        }));

        this.successors = produced.map(({ move, node }) => ({ move, key: node.key }));
        this.expanded = true;
        return produced;
    }

    /**
     * Merges another node for the same state into this one.
     *
     * The successor entries become the union of both nodes' entries. The caller
     * is responsible for re-scoring when this returns true.
     *
     * @returns Whether this node changed
     * @throws InvalidStateError if the keys differ
     */
    merge(other: SearchNode<State, Move, Player>): boolean {
        if (other.key !== this.key) {
            throw new InvalidStateError(`Cannot merge node ${other.key} into node ${this.key}`);
        }
        if (other === this || !other.expanded) {
            return false;
        }

        let changed = !this.expanded;
        const known = new Set(this.successors.map(entry => moveId(entry.move)));
        for (const entry of other.successors) {
            if (!known.has(moveId(entry.move))) {
                this.successors.push({ move: entry.move, key: entry.key });
                known.add(moveId(entry.move));
                changed = true;
            }
        }
        this.expanded = true;
        return changed;
    }

    /**
     * Stores a new evaluation and replaces the best-move cache.
     *
     * @returns Whether the scores changed
     */
    applyEvaluation(evaluation: NodeEvaluation<Move, Player>): boolean {
        const changed = !sameScores(this.currentScores, evaluation.scores);
        this.currentScores = evaluation.scores;
        this.bestMoveCache = evaluation.bestMoves;
        return changed;
    }
}

function sameScores<Player extends PropertyKey>(a: Scores<Player> | undefined, b: Scores<Player> | undefined): boolean {
    if (a === undefined || b === undefined) {
        return a === b;
    }
    const players = new Set<PropertyKey>([ ...Reflect.ownKeys(a), ...Reflect.ownKeys(b) ]);
    for (const player of players) {
        if (Reflect.get(a, player) !== Reflect.get(b, player)) {
            return false;
        }
    }
    return true;
}
