// cli/src/output/program.ts - JSON envelope for --json output
//
// Exit codes:
//   0 - every target succeeded
//   1 - at least one target failed (or the name did not resolve)
//   2 - CLI error (bad args, invalid config, unknown survey)

export interface ProgramEnvelope {
  status: 'ok' | 'error';
  data?: unknown;
  error?: string;
}

/**
 * Emit a JSON envelope to stdout.
 * Typed arrays are never serialized; falls back to an error envelope if
 * serialization fails.
 */
export function emitEnvelope(envelope: ProgramEnvelope): void {
  try {
    console.log(JSON.stringify(envelope, (_, v) => (v instanceof Uint8Array ? `<${v.length} bytes>` : v), 2));
  } catch (err) {
    console.log(JSON.stringify({ status: 'error', error: `Failed to serialize response: ${err instanceof Error ? err.message : String(err)}` }));
  }
}

export function emitOk(data?: unknown): void {
  const envelope: ProgramEnvelope = { status: 'ok' };
  if (data !== undefined) envelope.data = data;
  emitEnvelope(envelope);
}

export function emitError(message: string): void {
  emitEnvelope({ status: 'error', error: message });
}
