import type { Command } from '../types.js';
import { getIntOption, getOption, hasFlag, requireOption } from '../args.js';
import { createRecommender, withContext } from '../context.js';
import { formatResults } from '../format.js';
import { toRetrievalResultDto } from '../../retrieval/dto.js';
import { parseSkills } from '../../retrieval/query-builder.js';
import type { StructuredQuery } from '../../retrieval/types.js';

const USAGE =
  'arec recommend --title <job title> --skills <a,b,c> --level <experience> [--context <text>] [--k <n>] [--no-explain] [--json] [--rebuild <catalog>]';

export const recommendCommand: Command = {
  name: 'recommend',
  description: 'Recommend assessments for a role, with an explanation',
  usage: USAGE,
  handler: async (args) => {
    const query: StructuredQuery = {
      title: requireOption(args, 'title', USAGE),
      skills: parseSkills(requireOption(args, 'skills', USAGE)),
      experienceLevel: requireOption(args, 'level', USAGE),
      context: getOption(args, 'context'),
    };

    await withContext({ existing: true, rebuildFrom: getOption(args, 'rebuild') }, async (ctx) => {
      const k = getIntOption(args, 'k', ctx.config.retrieval.topK);
      const result = await createRecommender(ctx).recommend(query, {
        k,
        explain: hasFlag(args, 'no-explain') ? false : undefined,
      });

      if (hasFlag(args, 'json')) {
        console.log(
          JSON.stringify(
            {
              queryText: result.queryText,
              recommendations: result.results.map(toRetrievalResultDto),
              explanation: result.explanation,
              explanationError: result.explanationError,
            },
            null,
            2,
          ),
        );
        return;
      }

      console.log(`Query: ${result.queryText}`);
      console.log('');
      console.log(formatResults(result.results));
      if (result.explanation) {
        console.log('');
        console.log('Explanation:');
        console.log(result.explanation);
      } else if (result.explanationError) {
        console.log('');
        console.log(`(No explanation: ${result.explanationError})`);
      }
    });
  },
};
