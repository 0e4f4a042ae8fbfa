import { isSuccess } from '@skycut/contracts';
import type { FetchOneOptions } from '@skycut/pipeline';
import { numberOption, parseArgs, UsageError, type ParsedArgs } from '../args';
import { output, summarizeResult } from '../config';
import type { CommandContext } from './context';
import { describeResult, quietLine } from './format';

const USAGE = 'Usage: skycut fetch <target> [--survey <id|auto>] [--fov <arcmin>] [--size <px>] [--pixscale <arcsec>]';
const VALUE_OPTIONS = ['survey', 'fov', 'size', 'pixscale'] as const;

/** Options shared by fetch and batch */
export function fetchOptions(parsed: ParsedArgs, usage: string): FetchOneOptions {
  return {
    survey: parsed.options.get('survey'),
    fov: numberOption(parsed, 'fov', usage),
    size: numberOption(parsed, 'size', usage),
    pixscale: numberOption(parsed, 'pixscale', usage),
  };
}

/**
 * skycut fetch <target>
 *
 * The target may span several args, so `skycut fetch 10.68 -41.27` and
 * `skycut fetch Andromeda Galaxy` need no quoting.
 */
export async function fetchCommand(args: string[], ctx: CommandContext): Promise<number> {
  const parsed = parseArgs(args, VALUE_OPTIONS, USAGE);
  if (parsed.positionals.length === 0) {
    throw new UsageError('Missing target', USAGE);
  }
  const target = parsed.positionals.join(' ');
  const options = fetchOptions(parsed, USAGE);

  const result = await ctx.createClient().fetchOne(target, options);

  output(
    summarizeResult(result),
    () => { for (const line of describeResult(result)) console.log(line); },
    () => [quietLine(result)],
  );
  return isSuccess(result) ? 0 : 1;
}
