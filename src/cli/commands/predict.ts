import { writeFileSync } from 'node:fs';
import type { Command } from '../types.js';
import { UsageError } from '../types.js';
import { positionals, requireOption } from '../args.js';
import { createRetrieval, withContext } from '../context.js';

const USAGE = 'arec predict <queries.csv|queries.json|queries.txt> --out <predictions.csv>';

export const predictCommand: Command = {
  name: 'predict',
  description: 'Write Query,Assessment_URL predictions for unlabeled queries',
  usage: USAGE,
  handler: async (args) => {
    const [queriesPath] = positionals(args, ['out']);
    if (!queriesPath) {
      throw new UsageError('Queries path required', USAGE);
    }
    const out = requireOption(args, 'out', USAGE);

    const { loadQueries } = await import('../../evaluation/ground-truth.js');
    const { formatPredictionsCsv } = await import('../../evaluation/prediction-export.js');
    const { EvaluationPipeline } = await import('../../evaluation/pipeline.js');

    const queries = loadQueries(queriesPath);
    await withContext({ existing: true }, async (ctx) => {
      const pipeline = new EvaluationPipeline(createRetrieval(ctx), ctx.config.evaluation);
      const predictions = await pipeline.predict(queries);
      writeFileSync(out, formatPredictionsCsv(predictions), 'utf-8');
      console.log(`Wrote predictions for ${predictions.size} queries to ${out}`);
    });
  },
};
