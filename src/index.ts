#!/usr/bin/env node
import { program } from 'commander';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { loadConfig } from './config/loader.js';
import { logger } from './utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')));

// ── Global options ────────────────────────────────────────────────────────────
program
  .name('chatmark')
  .description('Render chat prompts for open model families and parse their tool calls')
  .version(pkg.version)
  .option('--profile <name>', 'use a specific config profile')
  .option('--model <name>', 'override the model')
  .option('--base-url <url>', 'override the runner base URL')
  .option('--no-color', 'disable color output')
  .option('--verbose', 'enable debug logging');

// ── Helpers ───────────────────────────────────────────────────────────────────
function globalOpts() {
  return program.opts<{
    profile?: string;
    model?: string;
    baseUrl?: string;
    color?: boolean;
    verbose?: boolean;
  }>();
}

function overrides(json?: boolean) {
  const g = globalOpts();
  return {
    profile: g.profile,
    model: g.model,
    baseUrl: g.baseUrl,
    noColor: g.color === false,
    json,
  };
}

program.hook('preAction', async () => {
  const g = globalOpts();
  try {
    const config = await loadConfig(process.cwd(), { profile: g.profile });
    logger.configure({
      level: g.verbose ? 'debug' : config.logLevel,
      redactPatterns: config.redactPatterns,
    });
  } catch {
    // Commands that need the config report the error themselves.
    logger.configure({ level: g.verbose ? 'debug' : 'warn' });
  }
});

// ── render ────────────────────────────────────────────────────────────────────
program
  .command('render [file]')
  .description('Render a JSON chat request into the model family prompt (stdin when no file)')
  .option('--json', 'output model, family and prompt as JSON')
  .action(async (file: string | undefined, cmdOpts: { json?: boolean }) => {
    const { runRender } = await import('./commands/render.js');
    await runRender(file, overrides(cmdOpts.json));
  });

// ── extract ───────────────────────────────────────────────────────────────────
program
  .command('extract [file]')
  .description('Extract tool calls from raw model output (stdin when no file)')
  .option('--message', 'print the assembled assistant message')
  .action(async (file: string | undefined, cmdOpts: { message?: boolean }) => {
    const { runExtract } = await import('./commands/extract.js');
    await runExtract(file, { message: cmdOpts.message });
  });

// ── inspect ───────────────────────────────────────────────────────────────────
program
  .command('inspect <model...>')
  .description('Show family, image token and embedding strategy for model ids')
  .option('--json', 'output as JSON')
  .action(async (models: string[], cmdOpts: { json?: boolean }) => {
    const { runInspect } = await import('./commands/inspect.js');
    runInspect(models, { json: cmdOpts.json });
  });

// ── params ────────────────────────────────────────────────────────────────────
program
  .command('params <size...>')
  .description('Parse parameter-size strings such as 7b, 1.5B or "7 billion"')
  .option('--json', 'output as JSON')
  .action(async (sizes: string[], cmdOpts: { json?: boolean }) => {
    const { runParams } = await import('./commands/params.js');
    runParams(sizes, { json: cmdOpts.json });
  });

// ── chat ──────────────────────────────────────────────────────────────────────
program
  .command('chat [file]')
  .description('Send a JSON chat request through the runner and print the assistant message')
  .action(async (file: string | undefined) => {
    const { runChat } = await import('./commands/chat.js');
    await runChat(file, overrides());
  });

// ── models ────────────────────────────────────────────────────────────────────
const models = program.command('models').description('Local model registry');

models
  .command('list')
  .description('List local models, largest first')
  .option('--json', 'output as JSON')
  .action(async (cmdOpts: { json?: boolean }) => {
    const { runModelsList } = await import('./commands/models.js');
    await runModelsList(overrides(cmdOpts.json));
  });

models
  .command('popular')
  .description('List recommended models')
  .option('--json', 'output as JSON')
  .action(async (cmdOpts: { json?: boolean }) => {
    const { runModelsPopular } = await import('./commands/models.js');
    runModelsPopular({ json: cmdOpts.json });
  });

// ── config ────────────────────────────────────────────────────────────────────
const config = program.command('config').description('Manage chatmark configuration');

config
  .command('show')
  .description('Show merged configuration')
  .action(async () => {
    const { runConfigShow } = await import('./commands/config.js');
    await runConfigShow(overrides());
  });

config
  .command('init')
  .description('Initialize a config file')
  .option('--global', 'write to ~/.chatmark/config.json')
  .option('--force', 'overwrite an existing file')
  .action(async (cmdOpts: { global?: boolean; force?: boolean }) => {
    const { runConfigInit } = await import('./commands/config.js');
    await runConfigInit(cmdOpts);
  });

// ── doctor ────────────────────────────────────────────────────────────────────
program
  .command('doctor')
  .description('Run system diagnostics')
  .action(async () => {
    const { runDoctor } = await import('./commands/doctor.js');
    await runDoctor(overrides());
  });

if (process.argv.slice(2).length === 0) {
  program.help();
}

await program.parseAsync();
