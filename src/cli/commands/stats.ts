import type { Command } from '../types.js';
import { hasFlag } from '../args.js';
import { withContext } from '../context.js';
import { CatalogStore } from '../../storage/catalog-store.js';

export const statsCommand: Command = {
  name: 'stats',
  description: 'Show index statistics',
  usage: 'arec stats [--json]',
  handler: async (args) => {
    await withContext({ loadModel: false }, async (ctx) => {
      const stats = CatalogStore.listCollections(ctx.db).map((name) =>
        new CatalogStore(ctx.db, ctx.embedder, name).stats(),
      );

      if (hasFlag(args, 'json')) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      if (stats.length === 0) {
        console.log('No collections built. Run: arec build <catalog>');
        return;
      }

      console.log('Index Statistics:');
      for (const s of stats) {
        console.log(`  ${s.name}${s.name === ctx.config.storage.collection ? ' (active)' : ''}`);
        console.log(`    Model:      ${s.modelId}`);
        console.log(`    Dimensions: ${s.dimensions}`);
        console.log(`    Entries:    ${s.count}`);
        console.log(`    Built:      ${s.builtAt}`);
      }
    });
  },
};
