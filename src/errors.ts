/**
 * Base class for errors raised by the search engine and its game adapters.
 */
export class SearchEngineError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * A move that is not in the legal move set of the position it was played in,
 * including any move on a finished game.
 */
export class IllegalMoveError extends SearchEngineError {}

/**
 * A broken contract: expanding a node twice, merging nodes with different keys,
 * asking for the winner of an unfinished game, misconfigured expansion.
 */
export class InvalidStateError extends SearchEngineError {}
