import { SearchTree } from '../search-tree.js';

/**
 * Runs after every committed move, once the current node has advanced.
 */
export interface PruningPolicy<State, Move, Player extends PropertyKey> {
    afterMove(tree: SearchTree<State, Move, Player>): void;
}

export class NoPruning<State, Move, Player extends PropertyKey> implements PruningPolicy<State, Move, Player> {
    afterMove(_tree: SearchTree<State, Move, Player>): void {}
}

/**
 * Reachability pruning: keeps exactly the nodes reachable from the new current
 * node through successor entries and deletes everything else.
 *
 * This bounds memory to the live subtree, at the price of forgetting states
 * that were only reachable through moves no longer available; they are
 * rebuilt if a transposition reaches them again. Reachability is computed
 * forward from the current node only.
 */
export class ReachabilityPruning<State, Move, Player extends PropertyKey> implements PruningPolicy<State, Move, Player> {
    constructor(private readonly debug: boolean = false) {}

    afterMove(tree: SearchTree<State, Move, Player>): void {
        const postMoveSize = tree.size;
        const reachable = reachableKeys(tree, tree.current.key);

        for (const key of tree.table.keys()) {
            if (!reachable.has(key)) {
                tree.table.delete(key);
            }
        }

        if (this.debug) {
            const postPruneSize = tree.size;
            console.log(`Search tree size: ${postMoveSize} (after move) - ${postMoveSize - postPruneSize} (pruned) = ${postPruneSize}`);
        }
    }
}

/**
 * Transitive closure of successor entries, starting at (and including) rootKey.
 * Keys that are not resident in the table are not followed.
 */
export function reachableKeys<State, Move, Player extends PropertyKey>(tree: SearchTree<State, Move, Player>, rootKey: string): Set<string> {
    const reachable = new Set<string>();
    const frontier = [ rootKey ];
    while (frontier.length > 0) {
        const key = frontier.pop();
        if (key === undefined || reachable.has(key)) {
            continue;
        }
        const node = tree.table.get(key);
        if (node === undefined) {
            continue;
        }
        reachable.add(key);
        frontier.push(...node.successorKeys().filter(successorKey => !reachable.has(successorKey)));
    }
    return reachable;
}
