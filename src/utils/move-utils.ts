/**
 * Moves are compared by their JSON encoding, so adapters can use tuples or
 * plain objects as moves without providing an equality function.
 */
export function moveId(move: unknown): string {
    return JSON.stringify(move);
}

export function containsMove<Move>(moves: readonly Move[], move: Move): boolean {
    const id = moveId(move);
    return moves.some(candidate => moveId(candidate) === id);
}

export function pickRandom<T>(items: readonly T[], random: () => number): T | undefined {
    if (items.length === 0) {
        return undefined;
    }
    return items[Math.floor(random() * items.length)];
}
