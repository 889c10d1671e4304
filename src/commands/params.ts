import { parseParamCount, formatParamCount } from '../adapters/param-count.js';
import { formatTable, printJson, writeOut } from '../ui/renderer.js';

export interface ParsedSize {
  input: string;
  count: number;
  display: string;
}

export function parseSizes(sizes: string[]): ParsedSize[] {
  return sizes.map((input) => {
    const count = parseParamCount(input);
    return { input, count, display: formatParamCount(count) };
  });
}

export function runParams(sizes: string[], options: { json?: boolean } = {}): void {
  const parsed = parseSizes(sizes);
  if (options.json) {
    printJson(parsed);
    return;
  }
  writeOut(formatTable(parsed.map((p) => [p.input, String(p.count), p.display])));
}
