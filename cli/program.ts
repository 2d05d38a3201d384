/**
 * Command-line definition
 */

import { Command } from 'commander';
import { defaultDependencies, runTask, type RunCommandOptions, type RunDependencies } from './run-task';

export function createProgram(deps: RunDependencies = defaultDependencies): Command {
  const program = new Command();

  // Must precede command() so subcommands inherit it
  program.exitOverride();

  program
    .name('routegraph')
    .description('Route coding tasks through an orchestrator and single-purpose workers')
    .version('0.1.0');

  program
    .command('run')
    .description('Run a task and print the final task state as JSON')
    .argument('[task...]', 'Task description (first line selects the task type)')
    .option('-f, --file <path>', 'Read the task description from a file')
    .option('--pr <url>', 'Review a GitHub pull request (uses its diff as the subject)')
    .option('--post', 'Post the review report as a pull request comment')
    .option('--max-steps <n>', 'Maximum orchestrator/worker round-trips')
    .option('--timeout <ms>', 'Timeout for a single worker invocation')
    .option('--log-level <level>', 'debug, info, warn or error')
    .option('-c, --config <path>', 'Config file to use before the default locations')
    .action(async (task: string[], options: RunCommandOptions) => {
      process.exitCode = await runTask(task, options, deps);
    });

  return program;
}
