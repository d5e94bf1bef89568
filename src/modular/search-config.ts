import { z } from 'zod';
import { GameAdapter } from '../search-types.js';
import { FirstMoveSelector } from '../strategies/first-move-selector.js';
import { MoveSelector } from '../strategies/move-selector.js';
import { RandomBestMoveSelector } from '../strategies/random-best-move-selector.js';
import { RandomMoveSelector } from '../strategies/random-move-selector.js';
import { CurrentNodeExpansion, ExpansionStrategy, LayeredExpansion, OneStepExpansion } from './expansion.js';
import { BoundedExpansion, ForwardSweepExpansion, FullExpansion } from './expansion-control.js';
import { NoPruning, PruningPolicy, ReachabilityPruning } from './pruning.js';
import { SearchEngine } from './search-engine.js';

export const expansionModes = [ 'current', 'one-step', 'full', 'forward-sweep' ] as const;

export const selectionModes = [ 'first', 'random', 'random-best' ] as const;

export const searchConfigSchema = z.object({
    expansion: z.enum(expansionModes),
    selection: z.enum(selectionModes),
    pruning: z.boolean(),
    timeLimit: z.number().nonnegative('Time limit must not be negative'),
    nodeLimit: z.number().int('Node limit must be a whole number').nonnegative('Node limit must not be negative'),
    searchDepth: z.number().int('Search depth must be a whole number').min(1, 'Search depth must be at least 1'),
    debug: z.boolean(),
});

export type SearchConfig = z.infer<typeof searchConfigSchema>;

export type ExpansionMode = SearchConfig['expansion'];

export type SelectionMode = SearchConfig['selection'];

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
    expansion: 'forward-sweep',
    selection: 'random-best',
    pruning: true,
    timeLimit: 0,
    nodeLimit: 0,
    searchDepth: 5,
    debug: false,
};

/**
 * Merges overrides into the defaults and validates the result.
 * Overrides that are undefined keep the default.
 *
 * @throws ZodError if any option is out of range
 */
export function parseSearchConfig(overrides: Partial<SearchConfig> = {}): SearchConfig {
    const defined = Object.fromEntries(Object.entries(overrides).filter(([ , value ]) => value !== undefined));
    return searchConfigSchema.parse({ ...DEFAULT_SEARCH_CONFIG, ...defined });
}

/**
 * Builds the expansion chain for a mode. Every mode is bounded by the time and
 * node limits; the bound sits directly around the granular strategy so that it
 * is checked between single steps:
 * - current: Bounded(CurrentNode)
 * - one-step: Bounded(OneStep)
 * - full: Full(Bounded(OneStep))
 * - forward-sweep: ForwardSweep(Bounded(Layered))
 */
export function createExpansion<State, Move, Player extends PropertyKey>(config: SearchConfig): ExpansionStrategy<State, Move, Player> {
    const budget = { timeLimit: config.timeLimit, nodeLimit: config.nodeLimit };
    switch (config.expansion) {
        case 'current':
            return new BoundedExpansion(new CurrentNodeExpansion<State, Move, Player>(), budget);
        case 'one-step':
            return new BoundedExpansion(new OneStepExpansion<State, Move, Player>(), budget);
        case 'full':
            return new FullExpansion(new BoundedExpansion(new OneStepExpansion<State, Move, Player>(), budget));
        case 'forward-sweep':
            return new ForwardSweepExpansion(
                new BoundedExpansion(new LayeredExpansion<State, Move, Player>(), budget),
                { searchDepth: config.searchDepth, debug: config.debug },
            );
    }
}

export function createSelector<State, Move, Player extends PropertyKey>(mode: SelectionMode, random: () => number = Math.random): MoveSelector<State, Move, Player> {
    switch (mode) {
        case 'first':
            return new FirstMoveSelector();
        case 'random':
            return new RandomMoveSelector(random);
        case 'random-best':
            return new RandomBestMoveSelector(random);
    }
}

/**
 * Creates a search engine for a game from (partial) configuration.
 *
 * @throws ZodError if the configuration is invalid
 */
export function createSearchEngine<State, Move, Player extends PropertyKey>(
    adapter: GameAdapter<State, Move, Player>,
    overrides: Partial<SearchConfig> = {},
    random: () => number = Math.random,
): SearchEngine<State, Move, Player> {
    const config = parseSearchConfig(overrides);
    const pruning: PruningPolicy<State, Move, Player> = config.pruning ? new ReachabilityPruning(config.debug) : new NoPruning();
    return new SearchEngine(adapter, {
        expansion: createExpansion<State, Move, Player>(config),
        selector: createSelector<State, Move, Player>(config.selection, random),
        pruning,
        debug: config.debug,
    });
}
