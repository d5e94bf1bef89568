import { expect } from 'chai';
import { InvalidStateError } from '../../src/errors.js';
import { SearchNode } from '../../src/search-node.js';
import { TicTacToeAdapter } from '../../src/adapters/tictactoe/index.js';
import { GraphGameAdapter, SIMPLE_GRAPH } from '../helpers/graph-game.js';

describe('SearchNode', () => {
    const adapter = new GraphGameAdapter(SIMPLE_GRAPH);

    it('should take its key from the adapter', () => {
        const node = new SearchNode(new TicTacToeAdapter(), new TicTacToeAdapter().startingState());
        expect(node.key).to.equal('---------:X');
        expect(node.nodeKey()).to.equal(node.key);
    });

    it('should start unexpanded, unscored and without successors', () => {
        const node = new SearchNode(adapter, 'root');

        expect(node.isExpanded).to.be.false;
        expect(node.getSuccessors()).to.deep.equal([]);
        expect(node.scores).to.be.undefined;
        expect(node.score('A')).to.be.undefined;
        expect(node.bestMove()).to.be.undefined;
    });

    describe('expand', () => {
        it('should produce one fresh node per legal move and record successor keys', () => {
            const node = new SearchNode(adapter, 'root');

            const produced = node.expand();

            expect(produced.map(({ move, node: successor }) => [ move, successor.key ])).to.deep.equal([
                [ 'a', 'n1' ],
                [ 'b', 'n2' ],
            ]);
            expect(produced.every(({ node: successor }) => !successor.isExpanded)).to.be.true;
            expect(node.isExpanded).to.be.true;
            expect(node.successorKeys()).to.deep.equal([ 'n1', 'n2' ]);
            expect(node.successorFor('b')).to.equal('n2');
            expect(node.successorFor('z')).to.be.undefined;
        });

        it('should mark terminal nodes expanded with no successors', () => {
            const node = new SearchNode(adapter, 't1');

            expect(node.expand()).to.deep.equal([]);
            expect(node.isExpanded).to.be.true;
            expect(node.isTerminal()).to.be.true;
        });

        it('should refuse to expand twice', () => {
            const node = new SearchNode(adapter, 'root');
            node.expand();

            expect(() => node.expand()).to.throw(InvalidStateError);
        });
    });

    describe('merge', () => {
        it('should be a no-op when merging a node with itself', () => {
            const node = new SearchNode(adapter, 'root');
            node.expand();

            expect(node.merge(node)).to.be.false;
            expect(node.successorKeys()).to.deep.equal([ 'n1', 'n2' ]);
        });

        it('should leave successors and scores unchanged when merging an identical copy', () => {
            const node = new SearchNode(adapter, 'root');
            node.expand();
            node.applyEvaluation({ scores: { A: 0, B: 0 }, bestMoves: [ 'b' ] });
            const copy = new SearchNode(adapter, 'root');
            copy.expand();

            expect(node.merge(copy)).to.be.false;
            expect(node.getSuccessors()).to.deep.equal([ { move: 'a', key: 'n1' }, { move: 'b', key: 'n2' } ]);
            expect(node.scores).to.deep.equal({ A: 0, B: 0 });
            expect(node.bestMove()).to.equal('b');
        });

        it('should ignore an unexpanded incoming node', () => {
            const node = new SearchNode(adapter, 'root');
            node.expand();

            expect(node.merge(new SearchNode(adapter, 'root'))).to.be.false;
            expect(node.successorKeys()).to.deep.equal([ 'n1', 'n2' ]);
        });

        it('should adopt the successors of an expanded incoming node', () => {
            const node = new SearchNode(adapter, 'root');
            const other = new SearchNode(adapter, 'root');
            other.expand();

            expect(node.merge(other)).to.be.true;
            expect(node.isExpanded).to.be.true;
            expect(node.successorKeys()).to.deep.equal([ 'n1', 'n2' ]);
        });

        it('should refuse to merge nodes with different keys', () => {
            const node = new SearchNode(adapter, 'n1');
            expect(() => node.merge(new SearchNode(adapter, 'n2'))).to.throw(InvalidStateError);
        });
    });

    describe('applyEvaluation', () => {
        it('should report whether the scores changed and always refresh the best moves', () => {
            const node = new SearchNode(adapter, 'root');

            expect(node.applyEvaluation({ scores: { A: 1, B: -1 }, bestMoves: [ 'a' ] })).to.be.true;
            expect(node.applyEvaluation({ scores: { A: 1, B: -1 }, bestMoves: [ 'a', 'b' ] })).to.be.false;
            expect(node.bestMoves).to.deep.equal([ 'a', 'b' ]);
            expect(node.score('B')).to.equal(-1);
            expect(node.applyEvaluation({ scores: undefined, bestMoves: [] })).to.be.true;
            expect(node.bestMove()).to.be.undefined;
        });
    });
});
