import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { BrokerClient } from '../../provider/brokerClient.js';

export function registerSubmitCommand(program: Command): void {
  program
    .command('submit <model> <prompt>')
    .description('Submit a completion request and wait for its result')
    .option('--kind <kind>', 'Request kind', 'completion')
    .option('--timeout <seconds>', 'Seconds to wait for a provider', '60')
    .action(async (model: string, prompt: string, opts: { kind: string; timeout: string }) => {
      const config = loadConfig();
      const client = new BrokerClient(config.provider.brokerUrl);
      const payload =
        opts.kind === 'chat_completion'
          ? { model, messages: [{ role: 'user', content: prompt }] }
          : { model, prompt };

      const outcome = await client.submitAndWait(
        opts.kind,
        model,
        payload,
        Math.round(parseFloat(opts.timeout) * 1000),
      );
      process.stdout.write(JSON.stringify(outcome, null, 2));
      process.stdout.write('\n');
    });
}
