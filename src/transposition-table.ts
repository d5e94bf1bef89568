import { SearchNode } from './search-node.js';

export type AddOutcome = 'inserted' | 'merged';

export type AddResult<State, Move, Player extends PropertyKey> = {
    outcome: AddOutcome;

    /** The resident node for the key after the call */
    node: SearchNode<State, Move, Player>;

    /** Whether the resident node changed (always true for insertions) */
    changed: boolean;
};

/**
 * Transposition table: the single owner of every search node, indexed by the
 * canonical key of its state.
 *
 * INVARIANT: at most one node per key. addOrMerge() is the only way in; a node
 * whose key is already resident is merged into the resident node instead of
 * being inserted.
 *
 * The table also records which keys lead to which (predecessor relation). Nodes
 * only know their successors, so this relation is what lets a score change
 * travel back up every path that converges on a state.
 */
export class TranspositionTable<State, Move, Player extends PropertyKey> {
    private readonly nodesByKey = new Map<string, SearchNode<State, Move, Player>>();

    private readonly predecessors = new Map<string, Set<string>>();

    get size(): number {
        return this.nodesByKey.size;
    }

    get(key: string): SearchNode<State, Move, Player> | undefined {
        return this.nodesByKey.get(key);
    }

    has(key: string): boolean {
        return this.nodesByKey.has(key);
    }

    keys(): string[] {
        return [ ...this.nodesByKey.keys() ];
    }

    nodes(): SearchNode<State, Move, Player>[] {
        return [ ...this.nodesByKey.values() ];
    }

    unexpandedNodes(): SearchNode<State, Move, Player>[] {
        return this.nodes().filter(node => !node.isExpanded);
    }

    hasUnexpandedNodes(): boolean {
        for (const node of this.nodesByKey.values()) {
            if (!node.isExpanded) {
                return true;
            }
        }
        return false;
    }

    addOrMerge(node: SearchNode<State, Move, Player>): AddResult<State, Move, Player> {
        const resident = this.nodesByKey.get(node.key);
        if (resident === undefined) {
            this.nodesByKey.set(node.key, node);
            if (node.isExpanded) {
                this.linkSuccessors(node.key, node.successorKeys());
            }
            return { outcome: 'inserted', node, changed: true };
        }

        const changed = resident.merge(node);
        if (changed) {
            this.linkSuccessors(resident.key, resident.successorKeys());
        }
        return { outcome: 'merged', node: resident, changed };
    }

    /**
     * Records that every key in successorKeys is reachable in one move from parentKey.
     */
    linkSuccessors(parentKey: string, successorKeys: readonly string[]): void {
        for (const key of successorKeys) {
            let keys = this.predecessors.get(key);
            if (keys === undefined) {
                keys = new Set();
                this.predecessors.set(key, keys);
            }
            keys.add(parentKey);
        }
    }

    /**
     * Resident keys known to lead to the given key in one move.
     */
    predecessorsOf(key: string): string[] {
        return [ ...(this.predecessors.get(key) ?? []) ].filter(predecessor => this.nodesByKey.has(predecessor));
    }

    delete(key: string): boolean {
        const node = this.nodesByKey.get(key);
        if (node === undefined) {
            return false;
        }
        this.nodesByKey.delete(key);
        this.predecessors.delete(key);
        for (const successorKey of node.successorKeys()) {
            this.predecessors.get(successorKey)?.delete(key);
        }
        return true;
    }
}
