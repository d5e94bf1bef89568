import { SearchNode } from '../search-node.js';
import { SearchTree } from '../search-tree.js';

/**
 * One-line summary of a node, e.g. `X--------:O expanded scores={"X":0,"O":0} best=[[1,1]] successors=8`.
 */
export const describeNode = <State, Move, Player extends PropertyKey>(node: SearchNode<State, Move, Player>): string => {
    const status = node.isExpanded ? 'expanded' : 'open';
    const scores = node.scores === undefined ? 'unknown' : JSON.stringify(node.scores);
    return `${node.key} ${status} scores=${scores} best=${JSON.stringify(node.bestMoves)} successors=${node.getSuccessors().length}`;
};

export const printTable = <State, Move, Player extends PropertyKey>(tree: SearchTree<State, Move, Player>): void => {
    console.log(`${tree.size} nodes, current=${tree.current.key}`);
    for (const node of tree.table.nodes()) {
        const marker = node === tree.current ? '* ' : '  ';
        console.log(`${marker}${describeNode(node)}`);
    }
};
