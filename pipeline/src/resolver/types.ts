// resolver/types.ts - Name-resolution backend contract

import type { ResolvedCoordinate } from "@skycut/contracts";

/**
 * Remote name → coordinate lookup.
 *
 * Resolves to null when the backend answers but knows no such object.
 * Throws NetworkError (retryable or not) when the backend can't answer.
 */
export interface NameService {
  readonly name: string;
  lookup(objectName: string): Promise<ResolvedCoordinate | null>;
}
