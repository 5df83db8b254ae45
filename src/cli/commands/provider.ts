import type { Command } from 'commander';
import { hostname } from 'node:os';
import { loadConfig } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { createLogger } from '../../logging/logger.js';
import { createBackend } from '../../backends/backendFactory.js';
import { BrokerClient } from '../../provider/brokerClient.js';
import { ProviderWorker } from '../../provider/providerWorker.js';

export function registerProviderCommand(program: Command): void {
  program
    .command('provider')
    .description('Run an example provider that serves requests from an upstream OpenAI-compatible endpoint')
    .option('--broker-url <url>', 'Broker base URL')
    .option('--id <providerId>', 'Provider identifier')
    .action(async (opts: { brokerUrl?: string; id?: string }) => {
      const config = loadConfig();
      if (opts.brokerUrl !== undefined) config.provider.brokerUrl = opts.brokerUrl;
      validateConfig(config);

      const logger = createLogger(config.logLevel, 'inferline-provider');
      const providerId = opts.id ?? config.provider.providerId ?? `${hostname()}-${process.pid}`;
      const worker = new ProviderWorker(
        new BrokerClient(config.provider.brokerUrl),
        createBackend(config.provider.backend),
        {
          providerId,
          kinds: config.provider.kinds,
          pollIntervalMs: config.provider.pollIntervalMs,
          modelRefreshIntervalMs: config.provider.modelRefreshIntervalMs,
          logger,
        },
      );

      process.once('SIGINT', () => worker.stop());
      process.once('SIGTERM', () => worker.stop());
      await worker.start();
    });
}
