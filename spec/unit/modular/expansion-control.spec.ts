import { expect } from 'chai';
import { TicTacToeAdapter } from '../../../src/adapters/tictactoe/index.js';
import type { Coord, Player, TicTacToeState } from '../../../src/adapters/tictactoe/rules.js';
import { InvalidStateError } from '../../../src/errors.js';
import { BoundedExpansion, ForwardSweepExpansion, FullExpansion } from '../../../src/modular/expansion-control.js';
import { CurrentNodeExpansion, ExpansionStrategy, LayeredExpansion, OneStepExpansion } from '../../../src/modular/expansion.js';
import { MinimaxScorer } from '../../../src/modular/scoring.js';
import { SearchTree } from '../../../src/search-tree.js';
import { GameAdapter } from '../../../src/search-types.js';
import { EndlessGameAdapter, GraphGameAdapter, GraphPlayer, SIMPLE_GRAPH } from '../../helpers/graph-game.js';
import { TICTACTOE_STATE_COUNT } from '../../helpers/tictactoe-helpers.js';

function createTree<State, Move, P extends PropertyKey>(adapter: GameAdapter<State, Move, P>): SearchTree<State, Move, P> {
    return new SearchTree(adapter, new MinimaxScorer(adapter));
}

/**
 * Runs one decision cycle the way the engine does.
 */
function runCycle<State, Move, P extends PropertyKey>(expansion: ExpansionStrategy<State, Move, P>, tree: SearchTree<State, Move, P>): boolean {
    expansion.begin?.(tree);
    return expansion.step(tree);
}

describe('Expansion control', () => {
    describe('FullExpansion', () => {
        it('should expand the whole game', () => {
            const tree = createTree(new TicTacToeAdapter());

            expect(runCycle(new FullExpansion(new OneStepExpansion<TicTacToeState, Coord, Player>()), tree)).to.be.true;

            expect(tree.size).to.equal(TICTACTOE_STATE_COUNT);
            expect(tree.table.hasUnexpandedNodes()).to.be.false;
        });

        it('should report no work on an already expanded table', () => {
            const tree = createTree(new TicTacToeAdapter());
            const expansion = new FullExpansion(new OneStepExpansion<TicTacToeState, Coord, Player>());
            runCycle(expansion, tree);

            expect(runCycle(expansion, tree)).to.be.false;
            expect(tree.size).to.equal(TICTACTOE_STATE_COUNT);
        });

        it('should stop when the inner strategy runs out of work', () => {
            const tree = createTree(new TicTacToeAdapter());

            runCycle(new FullExpansion(new CurrentNodeExpansion<TicTacToeState, Coord, Player>()), tree);

            expect(tree.size).to.equal(10);
            expect(tree.table.hasUnexpandedNodes()).to.be.true;
        });
    });

    describe('BoundedExpansion', () => {
        it('should halt an otherwise unbounded full expansion at the node limit', () => {
            const tree = createTree(new EndlessGameAdapter());
            const expansion = new FullExpansion(new BoundedExpansion(new OneStepExpansion<number, number, GraphPlayer>(), { nodeLimit: 10 }));

            runCycle(expansion, tree);

            // 1 -> 3 -> 7 -> 15 nodes: the limit is checked after each whole step
            expect(tree.size).to.equal(15);
        });

        it('should stop tic-tac-toe after the first ply with a node limit of 10', () => {
            const tree = createTree(new TicTacToeAdapter());

            runCycle(new FullExpansion(new BoundedExpansion(new OneStepExpansion<TicTacToeState, Coord, Player>(), { nodeLimit: 10 })), tree);

            expect(tree.size).to.equal(10);
        });

        it('should overshoot the node limit by whatever one inner step adds', () => {
            const tree = createTree(new TicTacToeAdapter());

            runCycle(new FullExpansion(new BoundedExpansion(new OneStepExpansion<TicTacToeState, Coord, Player>(), { nodeLimit: 11 })), tree);

            expect(tree.size).to.equal(82);
        });

        it('should halt an unbounded expansion shortly after the time limit', () => {
            const tree = createTree(new EndlessGameAdapter());
            const expansion = new FullExpansion(new BoundedExpansion(new OneStepExpansion<number, number, GraphPlayer>(), { timeLimit: 0.01 }));

            const startedAt = performance.now();
            runCycle(expansion, tree);
            const elapsedMs = performance.now() - startedAt;

            expect(tree.size).to.be.greaterThan(1);
            expect(elapsedMs).to.be.lessThan(2000);
        });

        it('should treat zero limits as unlimited', () => {
            const tree = createTree(new TicTacToeAdapter());

            runCycle(new FullExpansion(new BoundedExpansion(new OneStepExpansion<TicTacToeState, Coord, Player>())), tree);

            expect(tree.size).to.equal(TICTACTOE_STATE_COUNT);
        });

        it('should report "stop" after the first step of every later cycle once the table is over the limit', () => {
            const tree = createTree(new TicTacToeAdapter());
            const bounded = new BoundedExpansion(new OneStepExpansion<TicTacToeState, Coord, Player>(), { nodeLimit: 10 });

            expect(runCycle(bounded, tree)).to.be.false;
            expect(runCycle(bounded, tree)).to.be.false;
            expect(tree.size).to.equal(82);
        });

        it('should be nullified when it wraps a full expansion', () => {
            const tree = createTree(new TicTacToeAdapter());

            runCycle(new BoundedExpansion(new FullExpansion(new OneStepExpansion<TicTacToeState, Coord, Player>()), { nodeLimit: 10 }), tree);

            expect(tree.size).to.equal(TICTACTOE_STATE_COUNT);
        });

        it('should reject negative limits', () => {
            expect(() => new BoundedExpansion(new OneStepExpansion(), { nodeLimit: -1 })).to.throw(InvalidStateError);
            expect(() => new BoundedExpansion(new OneStepExpansion(), { timeLimit: -0.5 })).to.throw(InvalidStateError);
        });
    });

    describe('ForwardSweepExpansion', () => {
        const sweep = (searchDepth: number) => new ForwardSweepExpansion(new LayeredExpansion<TicTacToeState, Coord, Player>(), { searchDepth });

        it('should expand exactly one ply with depth 1', () => {
            const tree = createTree(new TicTacToeAdapter());

            expect(runCycle(sweep(1), tree)).to.be.true;

            expect(tree.size).to.equal(10);
        });

        it('should expand exactly three plies with depth 3', () => {
            const tree = createTree(new TicTacToeAdapter());

            runCycle(sweep(3), tree);

            expect(tree.size).to.equal(1 + 9 + 72 + 252);
            expect(tree.table.unexpandedNodes()).to.have.lengthOf(252);
        });

        it('should sweep again from the new current node after a move', () => {
            const tree = createTree(new TicTacToeAdapter());
            const expansion = sweep(2);
            runCycle(expansion, tree);

            tree.advance([ 1, 1 ]);
            runCycle(expansion, tree);

            // The 8 replies below the center were already there; their 8 * 7 successors are new
            expect(tree.size).to.equal(82 + 56);
        });

        it('should stop early once a layer yields nothing new', () => {
            const adapter = new GraphGameAdapter(SIMPLE_GRAPH);
            const tree = createTree(adapter);

            const result = runCycle(new ForwardSweepExpansion(new LayeredExpansion<string, string, GraphPlayer>(), { searchDepth: 10 }), tree);

            expect(result).to.be.false;
            expect(tree.size).to.equal(6);
            expect(tree.table.hasUnexpandedNodes()).to.be.false;
        });

        it('should stop the sweep at a bounded inner layer', () => {
            const tree = createTree(new TicTacToeAdapter());
            const expansion = new ForwardSweepExpansion(
                new BoundedExpansion(new LayeredExpansion<TicTacToeState, Coord, Player>(), { nodeLimit: 50 }),
                { searchDepth: 5 },
            );

            runCycle(expansion, tree);

            expect(tree.size).to.equal(82);
        });

        it('should require a whole search depth of at least 1', () => {
            expect(() => sweep(0)).to.throw(InvalidStateError);
            expect(() => sweep(-2)).to.throw(InvalidStateError);
            expect(() => sweep(1.5)).to.throw(InvalidStateError);
        });
    });
});
