import { loadConfig, getActiveProfile, resolveModelsDir } from '../config/loader.js';
import { createEngine } from '../providers/factory.js';
import { LocalModelRegistry } from '../registry/local.js';
import type { CliOverrides } from '../config/schema.js';

export interface CheckResult {
  ok: boolean;
  description: string;
  detail: string;
}

export async function check(description: string, fn: () => Promise<string | void>): Promise<CheckResult> {
  try {
    const detail = (await fn()) ?? '';
    return { ok: true, description, detail };
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { ok: false, description, detail };
  }
}

export async function runChecks(options: CliOverrides): Promise<CheckResult[]> {
  return Promise.all([
    check('Node.js version >= 20', () => {
      const version = process.version;
      const major = parseInt(version.slice(1).split('.')[0] ?? '0', 10);
      if (major < 20) {
        throw new Error(`Node.js ${version} detected, upgrade to v20 or later`);
      }
      return Promise.resolve(version);
    }),

    check('Config file is valid', async () => {
      const config = await loadConfig(process.cwd(), options);
      return `Active profile: "${config.defaultProfile}"`;
    }),

    check('Models directory', async () => {
      const config = await loadConfig(process.cwd(), options);
      const dir = resolveModelsDir(config);
      const models = await new LocalModelRegistry(dir).listModels();
      return `${models.length} model${models.length === 1 ? '' : 's'} in ${dir}`;
    }),

    check('Runner is reachable', async () => {
      const config = await loadConfig(process.cwd(), options);
      const profile = getActiveProfile(config);
      const engine = await createEngine(profile);
      await engine.health();
      return `${profile.baseUrl ?? 'default URL'} serving ${engine.info.model}`;
    }),
  ]);
}

export async function runDoctor(options: CliOverrides): Promise<void> {
  const chalk = (await import('chalk')).default;
  const results = await runChecks(options);

  process.stdout.write('\nchatmark doctor\n');
  process.stdout.write(chalk.dim('─'.repeat(60) + '\n\n'));

  for (const result of results) {
    const icon = result.ok ? chalk.green('[✓]') : chalk.red('[✗]');
    const label = result.ok ? chalk.green(result.description) : chalk.red(result.description);
    const detail = result.detail ? chalk.dim(` (${result.detail})`) : '';
    process.stdout.write(`${icon} ${label}${detail}\n`);
  }

  process.stdout.write('\n');

  const failCount = results.filter((r) => !r.ok).length;
  if (failCount === 0) {
    process.stdout.write(chalk.green('All checks passed.\n'));
    return;
  }

  process.stdout.write(chalk.yellow(`${failCount} check${failCount === 1 ? '' : 's'} failed.\n`));
  process.exitCode = 1;
}
