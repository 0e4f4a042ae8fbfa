import { isFailure, type FetchResult } from '@skycut/contracts';
import { numberOption, parseArgs, UsageError } from '../args';
import { getOutputMode, output, printTable, summarizeResult } from '../config';
import type { CommandContext } from './context';
import { fetchOptions } from './fetch';
import { quietLine, resultRow } from './format';

const USAGE = 'Usage: skycut batch <target>... [--file <path>] [--survey <id|auto>] [--fov <arcmin>] [--size <px>] [--pixscale <arcsec>] [--workers <n>]';
const VALUE_OPTIONS = ['file', 'survey', 'fov', 'size', 'pixscale', 'workers'] as const;

/** One target per line; blank lines and # comments skipped */
export function parseTargetList(content: string): string[] {
  return content
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * skycut batch <target>... [--file <path>]
 *
 * Each positional is one target (quote coordinate pairs). Targets from
 * --file follow the positionals. Ctrl-C stops claiming new targets; the
 * rest are reported as cancelled.
 */
export async function batchCommand(args: string[], ctx: CommandContext): Promise<number> {
  const parsed = parseArgs(args, VALUE_OPTIONS, USAGE);
  const targets = [...parsed.positionals];

  const file = parsed.options.get('file');
  if (file !== undefined) {
    let content: string;
    try {
      content = ctx.readFile(file);
    } catch (err) {
      throw new UsageError(`Cannot read target file ${file}: ${err instanceof Error ? err.message : String(err)}`, USAGE);
    }
    targets.push(...parseTargetList(content));
  }
  if (targets.length === 0) {
    throw new UsageError('No targets given', USAGE);
  }

  const options = {
    ...fetchOptions(parsed, USAGE),
    workerCount: numberOption(parsed, 'workers', USAGE),
  };

  const controller = new AbortController();
  const unsubscribe = ctx.onInterrupt(() => controller.abort());
  let results: FetchResult[];
  try {
    results = await ctx.createClient().fetchMany(targets, {
      ...options,
      signal: controller.signal,
      onProgress: (done, total, result) => {
        if (getOutputMode() === 'normal') {
          process.stderr.write(`[${done}/${total}] ${result.label}: ${result.status}\n`);
        }
      },
    });
  } finally {
    unsubscribe();
  }

  const failed = results.filter(isFailure).length;
  const succeeded = results.length - failed;

  output(
    { results: results.map(summarizeResult), succeeded, failed },
    () => {
      const rows = results.map((r, i) => resultRow(i, r));
      const targetWidth = Math.max(6, ...rows.map(r => (r[1] ?? '').length));
      printTable(['#', 'TARGET', 'STATUS', 'SURVEY', 'POSITION'], rows, [4, targetWidth, 17, 12, 20]);
      console.log('');
      console.log(`${succeeded}/${results.length} succeeded`);
    },
    () => results.map(quietLine),
  );
  return failed > 0 ? 1 : 0;
}
