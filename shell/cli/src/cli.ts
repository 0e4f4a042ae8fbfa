// cli/src/cli.ts - Command dispatch; main.ts wraps this with process I/O

import { readFileSync } from 'fs';
import { isSkycutError, NameResolutionError, ValidationError } from '@skycut/contracts';
import { CutoutClient, SesameNameService } from '@skycut/pipeline';
import { UsageError } from './args';
import { cliLogger, clientConfigFromEnv, reportError, setOutputMode } from './config';
import { batchCommand } from './commands/batch';
import type { CommandContext } from './commands/context';
import { fetchCommand } from './commands/fetch';
import { resolveCommand } from './commands/resolve';
import { surveysCommand } from './commands/surveys';

/**
 * Extract --json and --quiet from the raw argv array.
 * Returns the remaining args with those flags stripped.
 */
export function parseGlobalFlags(args: string[]): { json: boolean; quiet: boolean; remainingArgs: string[] } {
  let json = false;
  let quiet = false;
  const remainingArgs: string[] = [];
  for (const arg of args) {
    if (arg === '--json') { json = true; }
    else if (arg === '--quiet') { quiet = true; }
    else { remainingArgs.push(arg); }
  }
  return { json, quiet, remainingArgs };
}

export function printUsage(exitCode = 2): number {
  const out = exitCode === 0 ? console.log : console.error;
  out('Usage: skycut <command> [options]');
  out('');
  out('Commands:');
  out('  fetch <target>         Fetch one cutout (name, "ra dec" or sexagesimal)');
  out('  batch <target>...      Fetch many cutouts concurrently (--file <path> for a list)');
  out('  resolve <name>         Resolve an object name to coordinates');
  out('  surveys                List surveys in fallback order');
  out('  help                   Show this help');
  out('');
  out('Fetch options:');
  out('  --survey <id|auto>     Survey to use (default: auto fallback chain)');
  out('  --fov <arcmin>         Field of view (default: 1)');
  out('  --size <px>            Cutout size in pixels (overrides --fov)');
  out('  --pixscale <arcsec>    Pixel scale (default: per survey)');
  out('  --workers <n>          Batch concurrency (default: 8)');
  out('');
  out('Global flags (before or after command):');
  out('  --json                 Output as JSON ({ "status": ..., "data": ... } envelope)');
  out('  --quiet                Minimal output (one tab-separated line per target)');
  out('');
  out('Exit codes: 0 all succeeded, 1 a target failed, 2 usage or config error');
  return exitCode;
}

/**
 * SIGINT listener for a running batch: the first Ctrl-C stops new fetches,
 * a second one exits without waiting for in-flight requests.
 */
export function createInterruptListener(
  handler: () => void,
  exit: (code: number) => void = (code) => process.exit(code),
): () => void {
  let interrupted = false;
  return () => {
    if (interrupted) {
      process.stderr.write('\nInterrupted again, exiting.\n');
      exit(130);
      return;
    }
    interrupted = true;
    process.stderr.write('\nCancelling; in-flight targets will finish. Ctrl-C again to exit now.\n');
    handler();
  };
}

export const defaultContext: CommandContext = {
  createClient: () => new CutoutClient({
    config: clientConfigFromEnv(),
    nameService: new SesameNameService({ baseUrl: process.env.SKYCUT_SESAME_URL || undefined }),
    logger: cliLogger(),
  }),
  readFile: (path) => readFileSync(path, 'utf-8'),
  onInterrupt: (handler) => {
    const listener = createInterruptListener(handler);
    process.on('SIGINT', listener);
    return () => { process.off('SIGINT', listener); };
  },
};

/** Run one command line; resolves to the process exit code. */
export async function run(argv: string[], ctx: CommandContext = defaultContext): Promise<number> {
  const { json, quiet, remainingArgs: args } = parseGlobalFlags(argv);
  setOutputMode(json ? 'json' : quiet ? 'quiet' : 'normal');

  const command = args[0];
  const commandArgs = args.slice(1);
  if (command === undefined || command === '-h' || command === '--help') {
    return printUsage(command === undefined ? 2 : 0);
  }

  try {
    switch (command) {
      case 'help':
        return printUsage(0);
      case 'fetch':
        return await fetchCommand(commandArgs, ctx);
      case 'batch':
        return await batchCommand(commandArgs, ctx);
      case 'resolve':
        return await resolveCommand(commandArgs, ctx);
      case 'surveys':
        return await surveysCommand(commandArgs, ctx);
      default:
        console.error(`Unknown command: ${command}`);
        return printUsage(2);
    }
  } catch (err) {
    if (err instanceof UsageError) {
      reportError(err.message);
      console.error(err.usage);
      return 2;
    }
    if (err instanceof ValidationError) {
      reportError(err.message);
      return 2;
    }
    if (err instanceof NameResolutionError) {
      reportError(err.message);
      return 1;
    }
    if (isSkycutError(err)) {
      reportError(`${err.code}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
