#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { rewriteBareQuery } from './argv.js';
import { registerDirsCommands } from './commands/dirs.js';
import { registerIndexCommand } from './commands/index.js';
import { registerSearchCommand } from './commands/search.js';
import { registerMaintenanceCommands } from './commands/maintenance.js';
import { registerServeCommand } from './commands/serve.js';
import { registerMcpCommand } from './commands/mcp.js';

const require = createRequire(import.meta.url);

const pkg = require('../../package.json') as { version: string; description: string };

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('sift')
    .description(pkg.description)
    .version(pkg.version);

  registerDirsCommands(program);
  registerIndexCommand(program);
  registerSearchCommand(program);
  registerMaintenanceCommands(program);
  registerServeCommand(program);
  registerMcpCommand(program);

  const commands = program.commands.map((c) => c.name());
  await program.parseAsync(rewriteBareQuery(process.argv, commands));
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[sift] Error: ${message}\n`);
  process.exit(1);
});
