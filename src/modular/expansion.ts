import { SearchTree } from '../search-tree.js';

/**
 * One unit of expansion work.
 *
 * Strategies decide which nodes to expand; controls (see expansion-control.ts)
 * implement the same interface and wrap another strategy or control to decide
 * when to stop. The engine calls begin() once per decision cycle, then step().
 */
export interface ExpansionStrategy<State, Move, Player extends PropertyKey> {
    /**
     * Resets per-cycle bookkeeping. Wrappers must forward it to what they wrap.
     */
    begin?(tree: SearchTree<State, Move, Player>): void;

    /**
     * Performs one step.
     *
     * @returns Whether the caller may run another step
     */
    step(tree: SearchTree<State, Move, Player>): boolean;
}

/**
 * Expands only the current node, if it is not expanded yet.
 * Used when expansion is driven lazily, one move ahead at a time.
 */
export class CurrentNodeExpansion<State, Move, Player extends PropertyKey> implements ExpansionStrategy<State, Move, Player> {
    step(tree: SearchTree<State, Move, Player>): boolean {
        if (tree.current.isExpanded) {
            return false;
        }
        tree.expandNode(tree.current);
        return true;
    }
}

/**
 * Expands every node that is unexpanded when the step starts, once.
 * Not recursive: successors produced during the step wait for the next one.
 */
export class OneStepExpansion<State, Move, Player extends PropertyKey> implements ExpansionStrategy<State, Move, Player> {
    step(tree: SearchTree<State, Move, Player>): boolean {
        let expanded = false;
        for (const node of tree.table.unexpandedNodes()) {
            // An earlier expansion in this step may have merged into this node
            if (!node.isExpanded) {
                tree.expandNode(node);
                expanded = true;
            }
        }
        return expanded;
    }
}

/**
 * Breadth-first expansion, one layer (ply) per step, starting from the current node.
 *
 * LAYERS:
 * - begin() makes the current node the only member of layer 0
 * - step() expands every node of the layer that is not expanded yet, and turns
 *   its successors not yet seen during this sweep into the next layer
 * - step() returns false once a layer yields no new nodes
 *
 * Nodes already expanded by an earlier sweep are walked through, not rebuilt,
 * so every sweep pays for a full traversal from the current node.
 */
export class LayeredExpansion<State, Move, Player extends PropertyKey> implements ExpansionStrategy<State, Move, Player> {
    private layer: string[] = [];

    private seen = new Set<string>();

    begin(tree: SearchTree<State, Move, Player>): void {
        this.layer = [ tree.current.key ];
        this.seen = new Set(this.layer);
    }

    step(tree: SearchTree<State, Move, Player>): boolean {
        if (this.seen.size === 0) {
            this.begin(tree);
        }

        const nextLayer: string[] = [];
        for (const key of this.layer) {
            const node = tree.table.get(key);
            if (node === undefined) {
                continue;
            }
            if (!node.isExpanded) {
                tree.expandNode(node);
            }
            for (const successorKey of node.successorKeys()) {
                if (!this.seen.has(successorKey)) {
                    this.seen.add(successorKey);
                    nextLayer.push(successorKey);
                }
            }
        }

        this.layer = nextLayer;
        return nextLayer.length > 0;
    }

    /**
     * Keys of the layer the next step will expand.
     */
    get pendingLayer(): readonly string[] {
        return this.layer;
    }
}
