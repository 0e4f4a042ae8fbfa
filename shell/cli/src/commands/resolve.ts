import { formatCoordinate } from '@skycut/contracts';
import { parseArgs, UsageError } from '../args';
import { output } from '../config';
import type { CommandContext } from './context';

const USAGE = 'Usage: skycut resolve <name>';

/** skycut resolve <name> - name to coordinates, no image fetch */
export async function resolveCommand(args: string[], ctx: CommandContext): Promise<number> {
  const parsed = parseArgs(args, [], USAGE);
  const name = parsed.positionals.join(' ').trim();
  if (!name) {
    throw new UsageError('Missing object name', USAGE);
  }

  const coord = await ctx.createClient().resolve(name);

  output(
    { name, ra: coord.ra, dec: coord.dec },
    () => { console.log(`${name}: ${formatCoordinate(coord)}`); },
    () => [`${coord.ra} ${coord.dec}`],
  );
  return 0;
}
