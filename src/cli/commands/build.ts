import type { Command } from '../types.js';
import { UsageError } from '../types.js';
import { hasFlag, positionals } from '../args.js';
import { withContext } from '../context.js';

const USAGE = 'arec build <catalog.json|catalog.csv> [--append]';

export const buildCommand: Command = {
  name: 'build',
  description: 'Embed a catalog file into the vector index',
  usage: USAGE,
  handler: async (args) => {
    const [path] = positionals(args, []);
    if (!path) {
      throw new UsageError('Catalog path required', USAGE);
    }

    const { loadCatalog } = await import('../../catalog/catalog-loader.js');
    const records = loadCatalog(path);

    const stats = await withContext({}, (ctx) => ctx.store.build(records, { reset: !hasFlag(args, 'append') }));

    console.log(`Indexed ${stats.upserted} assessments into "${stats.collection}".`);
    console.log(`  Total entries: ${stats.total}`);
    console.log(`  Dimensions:    ${stats.dimensions}`);
    console.log(`  Time:          ${(stats.durationMs / 1000).toFixed(1)}s`);
  },
};
