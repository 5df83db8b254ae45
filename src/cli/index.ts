#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerServeCommand } from './commands/serve.js';
import { registerProviderCommand } from './commands/provider.js';
import { registerSubmitCommand } from './commands/submit.js';
import { registerStatsCommand } from './commands/stats.js';

const require = createRequire(import.meta.url);

const pkg = require('../../package.json') as { version: string; description: string };

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('inferline')
    .description(pkg.description)
    .version(pkg.version);

  registerServeCommand(program);
  registerProviderCommand(program);
  registerSubmitCommand(program);
  registerStatsCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[inferline] Error: ${message}\n`);
  process.exit(1);
});
