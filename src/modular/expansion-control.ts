import { InvalidStateError } from '../errors.js';
import { SearchTree } from '../search-tree.js';
import { ExpansionStrategy } from './expansion.js';

/**
 * Expansion Control
 *
 * Decorators that wrap an expansion strategy (or another control) with a
 * stopping policy. Each control is itself an ExpansionStrategy, so controls
 * chain in either order.
 *
 * CHAIN ORDER MATTERS:
 * - FullExpansion(BoundedExpansion(OneStepExpansion)) stops at the bound
 * - BoundedExpansion(FullExpansion(OneStepExpansion)) never stops early: the
 *   inner FullExpansion does not yield before its own fixed point, so the
 *   bound is only checked once everything is expanded
 * - ForwardSweepExpansion(BoundedExpansion(LayeredExpansion)) stops the sweep
 *   at the first layer after which the bound is exceeded
 */
export abstract class ExpansionControl<State, Move, Player extends PropertyKey> implements ExpansionStrategy<State, Move, Player> {
    constructor(protected readonly inner: ExpansionStrategy<State, Move, Player>) {}

    begin(tree: SearchTree<State, Move, Player>): void {
        this.inner.begin?.(tree);
    }

    abstract step(tree: SearchTree<State, Move, Player>): boolean;
}

/**
 * Runs the inner strategy until no resident node is left unexpanded, or until
 * the inner strategy reports that it has no more work.
 *
 * Only tractable when the whole game fits in memory (e.g. tic-tac-toe).
 *
 * @returns Whether any inner step did work
 */
export class FullExpansion<State, Move, Player extends PropertyKey> extends ExpansionControl<State, Move, Player> {
    step(tree: SearchTree<State, Move, Player>): boolean {
        let expansionHappened = false;
        while (tree.table.hasUnexpandedNodes()) {
            if (!this.inner.step(tree)) {
                break;
            }
            expansionHappened = true;
        }
        return expansionHappened;
    }
}

export interface ExpansionBudget {
    /** Wall-clock seconds per decision cycle, 0 for unlimited */
    timeLimit: number;

    /** Maximum table size, 0 for unlimited */
    nodeLimit: number;
}

/**
 * Reports "stop" once the time or node budget is used up.
 *
 * The limits are checked only after each inner step, never during one: a step
 * that expands many nodes can overshoot the node limit by that many nodes, and
 * a slow step can overshoot the time limit by its own duration. Pair it with a
 * granular inner strategy for a tight cap. With a node limit and no pruning,
 * every later cycle stops after its first step.
 */
export class BoundedExpansion<State, Move, Player extends PropertyKey> extends ExpansionControl<State, Move, Player> {
    readonly timeLimit: number;

    readonly nodeLimit: number;

    private startedAt: number | undefined;

    constructor(inner: ExpansionStrategy<State, Move, Player>, budget: Partial<ExpansionBudget> = {}) {
        super(inner);
        this.timeLimit = budget.timeLimit ?? 0;
        this.nodeLimit = budget.nodeLimit ?? 0;
        if (this.timeLimit < 0 || this.nodeLimit < 0) {
            throw new InvalidStateError(`Expansion budget must not be negative (timeLimit=${this.timeLimit}, nodeLimit=${this.nodeLimit})`);
        }
    }

    begin(tree: SearchTree<State, Move, Player>): void {
        this.startedAt = performance.now();
        super.begin(tree);
    }

    step(tree: SearchTree<State, Move, Player>): boolean {
        const startedAt = this.startedAt ?? performance.now();
        this.startedAt = startedAt;

        const expansionHappened = this.inner.step(tree);
        return expansionHappened && !this.isExhausted(tree, startedAt);
    }

    private isExhausted(tree: SearchTree<State, Move, Player>, startedAt: number): boolean {
        if (this.nodeLimit > 0 && tree.size >= this.nodeLimit) {
            return true;
        }
        const elapsedSeconds = (performance.now() - startedAt) / 1000;
        return this.timeLimit > 0 && elapsedSeconds >= this.timeLimit;
    }
}

export interface ForwardSweepOptions {
    /** Number of plies to expand from the current node, at least 1 */
    searchDepth: number;

    /** Log how many plies each sweep expanded */
    debug?: boolean;
}

/**
 * Fixed-depth layered expansion from the current node.
 *
 * Each cycle begins a fresh sweep and runs up to searchDepth inner steps,
 * stopping early once the inner strategy reports nothing new. Meant to wrap a
 * LayeredExpansion (optionally bounded), where one step is one ply.
 *
 * Returns whether the last layer still produced new nodes.
 *
 * Unlike iterative deepening it does not restart from the root with growing
 * limits; it re-sweeps the same depth from the current node on every move.
 */
export class ForwardSweepExpansion<State, Move, Player extends PropertyKey> extends ExpansionControl<State, Move, Player> {
    readonly searchDepth: number;

    private readonly debug: boolean;

    constructor(inner: ExpansionStrategy<State, Move, Player>, options: ForwardSweepOptions) {
        super(inner);
        if (!Number.isInteger(options.searchDepth) || options.searchDepth < 1) {
            throw new InvalidStateError(`Forward sweep needs a search depth of at least 1, got ${options.searchDepth}`);
        }
        this.searchDepth = options.searchDepth;
        this.debug = options.debug ?? false;
    }

    step(tree: SearchTree<State, Move, Player>): boolean {
        let plies = 0;
        let abort = false;
        while (plies < this.searchDepth && !abort) {
            abort = !this.inner.step(tree);
            plies++;
        }
        if (this.debug) {
            console.log(`${plies} plies expanded.`);
        }
        return !abort;
    }
}
