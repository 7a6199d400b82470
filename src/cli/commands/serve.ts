import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import { getIntegerFlag, getStringFlag } from '../parser.js';
import { PostureServer } from '../../web/server.js';
import { validateConfig } from '../../config/schema.js';
import { getLogger } from '../../observability/logger.js';

export function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

const serveCommand: Command = {
  name: 'serve',
  description: 'Start the posture analysis HTTP API',
  usage: 'serve [--port <port>] [--host <host>]',
  async run(ctx: CommandContext): Promise<number> {
    const port = getIntegerFlag(ctx.args, 'port') ?? ctx.config.port;
    const host = getStringFlag(ctx.args, 'host') ?? ctx.config.host;

    const errors = validateConfig({ port, host });
    if (errors.length > 0) {
      ctx.output.error(errors.map(e => `--${e.path}: ${e.message}`).join(', '));
      return 1;
    }

    const server = new PostureServer({ host, port, corsOrigins: ctx.config.corsOrigins });

    try {
      await server.start();
    } catch (error) {
      ctx.output.error(`Failed to start server: ${error instanceof Error ? error.message : String(error)}`);
      return 1;
    }

    ctx.output.log(`Server running at http://${host}:${server.address().port}`);
    ctx.output.log('Press Ctrl+C to stop');

    const signal = await waitForShutdownSignal();
    getLogger().info('Shutting down', { signal });
    await server.stop();
    return 0;
  },
};

registerCommand(serveCommand);

export default serveCommand;
