// cli/src/commands/context.ts - What every command needs from the outside

import type { CutoutClient } from '@skycut/pipeline';

export interface CommandContext {
  /** Built lazily so `skycut help` never validates config */
  createClient(): CutoutClient;
  readFile(path: string): string;
  /** SIGINT hook for batch cancellation; returns the unsubscribe */
  onInterrupt(handler: () => void): () => void;
}
