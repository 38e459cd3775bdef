import type { Command } from '../types.js';
import { UsageError } from '../types.js';
import { getIntOption, getOption, hasFlag, positionals } from '../args.js';
import { createRetrieval, withContext } from '../context.js';
import { formatResults } from '../format.js';
import { toRetrievalResultDto } from '../../retrieval/dto.js';

const USAGE = 'arec search <query> [--k <n>] [--json] [--rebuild <catalog>]';

export const searchCommand: Command = {
  name: 'search',
  description: 'Retrieve the closest assessments for a free-text query',
  usage: USAGE,
  handler: async (args) => {
    const text = positionals(args, ['k', 'rebuild']).join(' ');
    if (!text.trim()) {
      throw new UsageError('Query required', USAGE);
    }

    await withContext({ existing: true, rebuildFrom: getOption(args, 'rebuild') }, async (ctx) => {
      const k = getIntOption(args, 'k', ctx.config.retrieval.topK);
      const results = await createRetrieval(ctx).retrieve(text, k);

      if (hasFlag(args, 'json')) {
        console.log(JSON.stringify(results.map(toRetrievalResultDto), null, 2));
      } else {
        console.log(formatResults(results));
      }
    });
  },
};
