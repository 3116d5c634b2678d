#!/usr/bin/env node
import { Command } from 'commander';
import { RcompError } from './lib/errors.js';
import { collect } from './lib/args.js';
import { outputError } from './lib/output.js';

const program = new Command();

program
  .name('rcomp')
  .description('Compose review modules into budgeted prompts and score review sessions')
  .version('0.1.0')
  .exitOverride();

program
  .command('init')
  .description('Create .rcomp/config.yaml and a starter module manifest')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { initCommand } = await import('./commands/init.js');
    await initCommand(options);
  });

program
  .command('list')
  .description('List registered modules or goals')
  .argument('<type>', 'What to list: modules, goals')
  .option('-t, --tag <tag>', 'Only modules carrying this tag')
  .option('--json', 'Output as JSON')
  .action(async (type, options) => {
    const { listCommand } = await import('./commands/list.js');
    await listCommand(type, options);
  });

program
  .command('validate')
  .description('Load the module manifest and check its dependency graph')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { validateCommand } = await import('./commands/validate.js');
    await validateCommand(options);
  });

program
  .command('resolve')
  .description('Resolve modules into an ordered, budget-fitting execution plan')
  .option('-e, --explicit <ids>', 'Module ids to include (comma-separated, repeatable)', collect, [])
  .option('-g, --goal <tags>', 'Goal tags to include (comma-separated, repeatable)', collect, [])
  .option('-b, --budget <tokens>', 'Token budget for the composed artifact')
  .option('-m, --max-modules <n>', 'Maximum number of optional modules')
  .option('-o, --output <file>', 'Write the plan as JSON to a file')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { resolveCommand } = await import('./commands/resolve.js');
    await resolveCommand(options);
  });

program
  .command('compose')
  .description('Concatenate module content for a resolved plan')
  .requiredOption('-p, --plan <file>', 'Plan file written by "rcomp resolve --output"')
  .option('-o, --output <file>', 'Write the artifact to a file instead of stdout')
  .option('--json', 'Output the compose manifest as JSON')
  .action(async (options) => {
    const { composeCommand } = await import('./commands/compose.js');
    await composeCommand(options);
  });

const session = program
  .command('session')
  .description('Record findings in a review session');

session
  .command('start')
  .description('Create a new review session file')
  .option('--id <id>', 'Session id (default: generated)')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { sessionStartCommand } = await import('./commands/session.js');
    await sessionStartCommand(options);
  });

session
  .command('record')
  .description('Append a finding to a review session')
  .argument('<session-file>', 'Session file')
  .requiredOption('--module <id>', 'Module the finding belongs to')
  .requiredOption('-s, --severity <level>', 'P0, P1, P2, or P3')
  .requiredOption('-c, --category <category>', 'Finding category')
  .requiredOption('-d, --description <text>', 'What is wrong')
  .option('-l, --location <file:line>', 'Where it was found')
  .option('--json', 'Output as JSON')
  .action(async (sessionFile, options) => {
    const { sessionRecordCommand } = await import('./commands/session.js');
    await sessionRecordCommand(sessionFile, options);
  });

session
  .command('finalize')
  .description('Close a review session and store its score')
  .argument('<session-file>', 'Session file')
  .option('--json', 'Output as JSON')
  .action(async (sessionFile, options) => {
    const { sessionFinalizeCommand } = await import('./commands/session.js');
    await sessionFinalizeCommand(sessionFile, options);
  });

program
  .command('score')
  .description('Print the score report of a review session')
  .requiredOption('--session <file>', 'Session file')
  .option('--finalize', 'Finalize the session before scoring')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { scoreCommand } = await import('./commands/score.js');
    await scoreCommand(options);
  });

function wantsJson(argv: string[]): boolean {
  return argv.includes('--json');
}

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof RcompError) {
      outputError(err, wantsJson(process.argv));
      process.exit(err.exitCode);
    }
    if (err instanceof Error && 'code' in err) {
      const { code } = err;
      if (code === 'commander.helpDisplayed' || code === 'commander.version') {
        process.exit(0);
      }
      if (typeof code === 'string' && code.startsWith('commander.')) {
        process.exit(1);
      }
    }
    outputError(err, false);
    process.exit(1);
  }
}

void main();
