import { IllegalMoveError, InvalidStateError } from '../errors.js';
import { SearchNode } from '../search-node.js';
import { SearchTree } from '../search-tree.js';
import { GameAdapter, Scores } from '../search-types.js';
import { MoveSelector } from '../strategies/move-selector.js';
import { printTable } from '../utils/tree-debug.js';
import { ExpansionStrategy } from './expansion.js';
import { NoPruning, PruningPolicy } from './pruning.js';
import { MinimaxScorer, Scorer } from './scoring.js';

export interface SearchEngineComponents<State, Move, Player extends PropertyKey> {
    /** Strategy or control chain run once per decision cycle */
    expansion: ExpansionStrategy<State, Move, Player>;

    selector: MoveSelector<State, Move, Player>;

    /** Defaults to MinimaxScorer over the adapter */
    scorer?: Scorer<State, Move, Player>;

    /** Defaults to NoPruning */
    pruning?: PruningPolicy<State, Move, Player>;

    /** Print the board and the table size after every move */
    debug?: boolean;

    /** Start from this state instead of adapter.startingState() */
    startingState?: State;
}

/**
 * Search engine for one game session.
 *
 * DECISION CYCLE:
 * 1. EXPAND: begin + one step of the configured expansion strategy/control chain
 * 2. SCORE: happens during expansion, whenever nodes are inserted or merged
 * 3. SELECT: the move selector picks from the current node
 * 4. COMMIT: makeMove() advances the current node
 * 5. PRUNE: the pruning policy cleans up the table
 *
 * The engine owns the tree exclusively. Nothing here catches errors: illegal
 * moves and broken contracts propagate to the caller.
 */
export class SearchEngine<State, Move, Player extends PropertyKey> {
    readonly tree: SearchTree<State, Move, Player>;

    private readonly expansion: ExpansionStrategy<State, Move, Player>;

    private readonly selector: MoveSelector<State, Move, Player>;

    private readonly pruning: PruningPolicy<State, Move, Player>;

    private readonly debug: boolean;

    constructor(
        public readonly adapter: GameAdapter<State, Move, Player>,
        components: SearchEngineComponents<State, Move, Player>,
    ) {
        this.expansion = components.expansion;
        this.selector = components.selector;
        this.pruning = components.pruning ?? new NoPruning();
        this.debug = components.debug ?? false;
        this.tree = new SearchTree(
            adapter,
            components.scorer ?? new MinimaxScorer(adapter),
            components.startingState ?? adapter.startingState(),
        );
    }

    get currentNode(): SearchNode<State, Move, Player> {
        return this.tree.current;
    }

    numStates(): number {
        return this.tree.size;
    }

    currentScore(): Scores<Player> | undefined {
        return this.tree.current.scores;
    }

    activePlayer(): Player | null {
        return this.adapter.activePlayer(this.tree.current.state);
    }

    isFinished(): boolean {
        return this.adapter.isFinished(this.tree.current.state);
    }

    allLegalMoves(): Move[] {
        return this.adapter.allLegalMoves(this.tree.current.state);
    }

    /**
     * @throws InvalidStateError if the game is not finished
     */
    winner(): Player | null {
        return this.adapter.winner(this.tree.current.state);
    }

    /**
     * Runs one decision cycle's worth of expansion.
     *
     * @returns What the expansion chain reported: whether more work remains
     */
    expandSearchTree(): boolean {
        this.expansion.begin?.(this.tree);
        const result = this.expansion.step(this.tree);

        if (process.env.DEBUG_SEARCH_TREE === 'true') {
            console.log('\n[SEARCH-TREE] Table after expansion:');
            printTable(this.tree);
        }
        return result;
    }

    /**
     * Expands the tree and picks a move for the player to move.
     *
     * @throws InvalidStateError if the game is already finished
     */
    chooseMove(): Move {
        if (this.isFinished()) {
            throw new InvalidStateError(`No move to choose: state ${this.tree.current.key} is finished`);
        }

        this.expandSearchTree();
        if (!this.tree.current.isExpanded) {
            this.tree.expandNode(this.tree.current);
        }

        const move = this.selector.selectMove(this.tree.current);
        if (move === undefined) {
            throw new InvalidStateError(`No legal move in unfinished state ${this.tree.current.key}`);
        }
        return move;
    }

    /**
     * Commits a move: advances the current node, then prunes.
     *
     * @throws IllegalMoveError if the move is not legal; nothing changes in that case
     */
    makeMove(move: Move): void {
        if (this.isFinished()) {
            throw new IllegalMoveError(`Illegal move ${JSON.stringify(move)}: the game is finished`);
        }
        this.tree.advance(move);
        this.pruning.afterMove(this.tree);
    }

    /**
     * Plays against itself until the game is finished.
     *
     * @returns The winner, or null for a draw
     */
    play(): Player | null {
        this.report();
        while (!this.isFinished()) {
            this.makeMove(this.chooseMove());
            this.report();
        }
        return this.winner();
    }

    private report(): void {
        if (!this.debug) {
            return;
        }
        const state = this.tree.current.state;
        console.log(this.adapter.describe?.(state) ?? this.tree.current.key);
        console.log(`Nodes in the search tree: ${this.tree.size}`);
    }
}
