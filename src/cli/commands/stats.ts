import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { BrokerClient } from '../../provider/brokerClient.js';

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show request counts per status on the broker')
    .action(async () => {
      const config = loadConfig();
      const stats = await new BrokerClient(config.provider.brokerUrl).stats();
      for (const [status, count] of Object.entries(stats)) {
        process.stdout.write(`${status.padEnd(11)} ${count}\n`);
      }
    });
}
