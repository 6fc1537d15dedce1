import { Command } from 'commander';
import { lsCommand, orderCommand } from './commands/index.js';
import type { LsOptions } from './commands/ls.js';
import type { OrderOptions } from './commands/order.js';

const program = new Command();

program
  .name('stack-order')
  .description('Order infrastructure stacks by the dependencies declared in their dependencies.json')
  .version('1.0.0');

program
  .command('order', { isDefault: true })
  .description('Print stacks as JSON in dependency order')
  .option('-r, --reverse', 'Reverse the order, for a destroy run')
  .option('-d, --draw [file]', 'Also write the dependency graph as a DOT file')
  .option('-b, --base-dir <dir>', 'Directory containing the stacks')
  .option('--max-depth <depth>', 'How many directory levels to search for stacks')
  .option('--github-output [name]', 'Append the JSON to $GITHUB_OUTPUT under this name')
  .action(async (options: OrderOptions) => {
    await orderCommand({ options });
  });

program
  .command('ls')
  .description('Show stacks in dependency order as a readable list')
  .option('-r, --reverse', 'Show the destroy order')
  .option('-b, --base-dir <dir>', 'Directory containing the stacks')
  .option('--max-depth <depth>', 'How many directory levels to search for stacks')
  .action(async (options: LsOptions) => {
    await lsCommand({ options });
  });

export const run = async (argv: string[] = process.argv): Promise<void> => {
  await program.parseAsync(argv);
};

export { program };
