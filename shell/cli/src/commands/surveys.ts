import { parseArgs } from '../args';
import { output, printTable } from '../config';
import type { CommandContext } from './context';

const USAGE = 'Usage: skycut surveys';

/** skycut surveys - the fallback chain, highest priority first */
export async function surveysCommand(args: string[], ctx: CommandContext): Promise<number> {
  parseArgs(args, [], USAGE);
  const surveys = ctx.createClient().surveys();

  const data = surveys.map(s => ({
    id: s.id,
    description: s.description,
    priority: s.priority,
    bands: [...s.bands],
    decRange: [...s.decRange],
    pixscale: s.defaultPixscale,
    maxSize: s.maxSize,
  }));

  output(data, () => {
    const rows = surveys.map(s => [
      s.id,
      String(s.priority),
      `${s.decRange[0]}..${s.decRange[1]}`,
      [...s.bands].join(','),
      String(s.defaultPixscale),
      s.description,
    ]);
    printTable(['ID', 'PRIORITY', 'DEC', 'BANDS', 'PIXSCALE', 'DESCRIPTION'], rows, [12, 8, 10, 10, 8, 30]);
  }, () => surveys.map(s => s.id));
  return 0;
}
