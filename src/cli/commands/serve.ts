import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { createLogger } from '../../logging/logger.js';
import { InferenceBroker } from '../../broker/broker.js';
import { createApiServer } from '../../api/server.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the broker HTTP server')
    .option('--port <n>', 'Port to listen on')
    .option('--host <h>', 'Host to bind to')
    .action(async (opts: { port?: string; host?: string }) => {
      const config = loadConfig();
      if (opts.port !== undefined) config.api.port = parseInt(opts.port, 10);
      if (opts.host !== undefined) config.api.host = opts.host;
      validateConfig(config);

      const logger = createLogger(config.logLevel);
      const broker = new InferenceBroker({ ...config.broker, logger });
      const app = createApiServer({ broker, logger });

      const { port, host } = config.api;
      await app.listen({ port, host });
      logger.info({ orphanPolicy: config.broker.orphanPolicy }, `broker listening on http://${host}:${port}`);

      const shutdown = (): void => {
        app.close().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error({ err }, 'shutdown failed');
            process.exit(1);
          },
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
}
