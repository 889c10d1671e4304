import type { ChalkInstance } from 'chalk';

let chalkInstance: ChalkInstance | null = null;

export async function getChalk(): Promise<ChalkInstance> {
  if (!chalkInstance) {
    const mod = await import('chalk');
    chalkInstance = mod.default;
  }
  return chalkInstance;
}

/** Write text to stdout, ending it with a newline if it has none. */
export function writeOut(text: string): void {
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
}

export function printJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}

export async function printError(message: string): Promise<void> {
  const ck = await getChalk();
  process.stderr.write(ck.red(`Error: ${message}`) + '\n');
}

export async function printSuccess(message: string): Promise<void> {
  const ck = await getChalk();
  process.stderr.write(ck.green(message) + '\n');
}

/** Rows of cells padded into aligned columns. */
export function formatTable(rows: ReadonlyArray<readonly string[]>): string {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows
    .map((row) =>
      row
        .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
        .join('  ')
    )
    .join('\n');
}
