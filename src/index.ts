#!/usr/bin/env node

/**
 * guardrun: run agent-proposed actions under a deny-by-default policy
 *
 * Usage:
 *   guardrun init-config [--path <file>]
 *   guardrun check <command...> | --read <path> | --write <path>
 *   guardrun run <command...>
 *   guardrun read <path>
 *   guardrun write <path> (--content <text> | --from <file>)
 *   guardrun run-plan <file>
 *   guardrun queue enqueue|work|list|show|requeue
 *   guardrun audit tail
 *
 * Global options go before the subcommand:
 *   guardrun --yes --cwd ./repo run -- git status
 *   --config <file> --dry-run --yes --cwd <dir> --quiet
 */

import { Command } from 'commander';
import { auditTailCommand, type AuditTailOptions } from './commands/audit.js';
import { checkCommand, type CheckOptions } from './commands/check.js';
import { action, parseCount, type GlobalOptions } from './commands/context.js';
import { readCommand, writeCommand, type WriteOptions } from './commands/files.js';
import { initConfigCommand, type InitConfigOptions } from './commands/init-config.js';
import { runPlanCommand } from './commands/plan.js';
import {
  enqueueCommand,
  listJobsCommand,
  requeueCommand,
  showJobCommand,
  workCommand,
  type EnqueueOptions,
  type ListJobsOptions,
  type WorkOptions,
} from './commands/queue.js';
import { runCommand } from './commands/run.js';

const program = new Command();

program
  .name('guardrun')
  .description('Policy-gated execution of commands and file operations')
  .version('0.1.0')
  .option('--config <file>', 'Config file (default: ./.guardrun.config.yml if present)')
  .option('--dry-run', 'Evaluate and audit, but execute nothing', false)
  .option('--yes', 'Pre-authorize actions that would ask for confirmation', false)
  .option('--cwd <dir>', 'Working directory for relative paths')
  .option('--quiet', 'No progress lines on stderr', false)
  .enablePositionalOptions();

const globals = (cmd: Command): GlobalOptions => cmd.optsWithGlobals<GlobalOptions>();

// guardrun init-config
program
  .command('init-config')
  .description('Write a config file with the default settings')
  .option('--path <file>', 'Where to write it')
  .option('--force', 'Overwrite an existing file', false)
  .action(action((options: InitConfigOptions, cmd: Command) => initConfigCommand(options, globals(cmd))));

// guardrun check
program
  .command('check')
  .description('Evaluate an action against the policy without running it')
  .argument('[command...]', 'Command to check')
  .option('--read <path>', 'Check reading a file')
  .option('--write <path>', 'Check writing a file')
  .passThroughOptions()
  .action(
    action((command: string[], options: CheckOptions, cmd: Command) => checkCommand(command, options, globals(cmd))),
  );

// guardrun run -- <command>
program
  .command('run')
  .description('Run one command (never through a shell)')
  .argument('<command...>', 'Command and arguments')
  .passThroughOptions()
  .action(action((command: string[], _options: object, cmd: Command) => runCommand(command, globals(cmd))));

// guardrun read / write
program
  .command('read <path>')
  .description('Read a file inside the allowed roots')
  .action(action((target: string, _options: object, cmd: Command) => readCommand(target, globals(cmd))));

program
  .command('write <path>')
  .description('Write a file inside the allowed roots')
  .option('--content <text>', 'Content to write')
  .option('--from <file>', 'Take the content from a local file')
  .action(
    action((target: string, options: WriteOptions, cmd: Command) => writeCommand(target, options, globals(cmd))),
  );

// guardrun run-plan
program
  .command('run-plan <file>')
  .description('Run a YAML/JSON plan of steps, stopping at the first failure')
  .action(action((file: string, _options: object, cmd: Command) => runPlanCommand(file, globals(cmd))));

// guardrun queue
const queue = program
  .command('queue')
  .description('Durable job queue')
  .enablePositionalOptions();

queue
  .command('enqueue <kind>')
  .description('Queue a job: command, read_file, write_file or plan (put "--" before command flags)')
  .argument('[args...]', 'Command, path or plan file')
  .option('--content <text>', 'Content for write_file')
  .option('--from <file>', 'Take write_file content from a local file')
  .option('--workdir <dir>', 'Working directory for a command job')
  .option('--max-attempts <n>', 'Attempts before the job fails for good', parseCount)
  .action(
    action((kind: string, args: string[], options: EnqueueOptions, cmd: Command) =>
      enqueueCommand(kind, args, options, globals(cmd)),
    ),
  );

queue
  .command('work')
  .description('Process queued jobs until none are left')
  .option('--max-jobs <n>', 'Stop after this many jobs', parseCount)
  .action(action((options: WorkOptions, cmd: Command) => workCommand(options, globals(cmd))));

queue
  .command('list')
  .description('List jobs, newest first')
  .option('--status <status>', 'queued, running, done, failed or blocked')
  .option('--limit <n>', 'How many', parseCount)
  .action(action((options: ListJobsOptions, cmd: Command) => listJobsCommand(options, globals(cmd))));

queue
  .command('show <id>')
  .description('Show one job')
  .action(action((id: string, _options: object, cmd: Command) => showJobCommand(id, globals(cmd))));

queue
  .command('requeue <id>')
  .description('Return a job stranded in "running" to the queue')
  .action(action((id: string, _options: object, cmd: Command) => requeueCommand(id, globals(cmd))));

// guardrun audit
const audit = program
  .command('audit')
  .description('Inspect the audit log');

audit
  .command('tail')
  .description('Show the most recent audit events')
  .option('--limit <n>', 'How many', parseCount)
  .option('--status <status>', 'attempted, blocked, skipped, succeeded or failed')
  .action(action((options: AuditTailOptions, cmd: Command) => auditTailCommand(options, globals(cmd))));

await program.parseAsync();
