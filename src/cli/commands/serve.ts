import type { Command } from '../types.js';
import { getIntOption, getOption } from '../args.js';
import { createRecommender, withContext } from '../context.js';

export const serveCommand: Command = {
  name: 'serve',
  description: 'Start the HTTP recommendation API',
  usage: 'arec serve [--port <port>] [--rebuild <catalog>]',
  handler: async (args) => {
    const { createApp, startServer } = await import('../../server/app.js');

    await withContext({ existing: true, rebuildFrom: getOption(args, 'rebuild') }, async (ctx) => {
      const port = getIntOption(args, 'port', ctx.config.server.port);
      const app = createApp({ recommender: createRecommender(ctx), index: ctx.store });
      await startServer(app, port);
    });
  },
};
