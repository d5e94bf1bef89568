/**
 * Self-play tic-tac-toe from the command line.
 *
 * Usage:
 *   npm run play -- --expansion forward-sweep --search-depth 5 --node-limit 100 --debug
 */

import { parseArgs } from 'node:util';
import { ZodError } from 'zod';
import { TicTacToeAdapter, createSearchEngine, searchConfigSchema } from '../src/index.js';

const { values } = parseArgs({
    options: {
        'expansion': { type: 'string' },
        'selection': { type: 'string' },
        'time-limit': { type: 'string' },
        'node-limit': { type: 'string' },
        'search-depth': { type: 'string' },
        'no-pruning': { type: 'boolean', default: false },
        'debug': { type: 'boolean', default: false },
    },
});

const numberOption = (value: string | undefined): number | undefined => value === undefined ? undefined : Number(value);

try {
    const overrides = searchConfigSchema.partial().parse({
        expansion: values.expansion,
        selection: values.selection,
        timeLimit: numberOption(values['time-limit']),
        nodeLimit: numberOption(values['node-limit']),
        searchDepth: numberOption(values['search-depth']),
        pruning: !values['no-pruning'],
        debug: values.debug,
    });

    const engine = createSearchEngine(new TicTacToeAdapter(), overrides);
    const winner = engine.play();

    console.log(winner === null ? 'Draw' : `Winner: ${winner}`);
    console.log(`Nodes left in the search tree: ${engine.numStates()}`);
} catch (error) {
    if (error instanceof ZodError) {
        console.error(`Invalid options: ${error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
        process.exitCode = 1;
    } else {
        throw error;
    }
}
