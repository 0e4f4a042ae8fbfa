// resolver/sesame.ts - CDS Sesame name resolver over HTTP
//
// Uses the plain-XML output mode (-oxp) and asks Simbad, NED and VizieR in
// turn (~SNV). The first <jradeg>/<jdedeg> pair in the reply wins.

import {
  NetworkError,
  TIMING,
  isValidDec,
  isValidRa,
  makeCoordinate,
  type ResolvedCoordinate,
} from "@skycut/contracts";
import { mapHttpStatus, withNetworkErrorMapping } from "../net";
import type { NameService } from "./types";

export const SESAME_DEFAULT_URL = "https://cds.unistra.fr/cgi-bin/nph-sesame";

export interface SesameOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Injectable fetch for testing */
  _fetchImpl?: typeof fetch;
}

export class SesameNameService implements NameService {
  readonly name = "sesame";
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SesameOptions = {}) {
    this.baseUrl = (options.baseUrl ?? SESAME_DEFAULT_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? TIMING.RESOLVE_TIMEOUT_MS;
    this.fetchImpl = options._fetchImpl ?? globalThis.fetch.bind(globalThis);
  }

  lookupUrl(objectName: string): string {
    return `${this.baseUrl}/-oxp/~SNV?${encodeURIComponent(objectName.trim())}`;
  }

  async lookup(objectName: string): Promise<ResolvedCoordinate | null> {
    const url = this.lookupUrl(objectName);
    const body = await withNetworkErrorMapping(this.name, this.timeoutMs, async () => {
      const response = await this.fetchImpl(url, {
        headers: { Accept: "text/xml" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        await response.body?.cancel();
        throw mapHttpStatus(this.name, response.status);
      }
      return response.text();
    });
    return parseSesameXml(body);
  }
}

/** Extract the first decimal-degree position from a Sesame XML reply. */
export function parseSesameXml(xml: string): ResolvedCoordinate | null {
  const ra = /<jradeg>\s*([^<]+?)\s*<\/jradeg>/i.exec(xml)?.[1];
  const dec = /<jdedeg>\s*([^<]+?)\s*<\/jdedeg>/i.exec(xml)?.[1];
  if (ra === undefined || dec === undefined) return null;

  const raDeg = Number(ra);
  const decDeg = Number(dec);
  if (!isValidRa(raDeg) || !isValidDec(decDeg)) {
    throw new NetworkError("sesame", `sesame returned an invalid position (${ra}, ${dec})`, {
      code: "HTTP_ERROR",
      retryable: false,
    });
  }
  return makeCoordinate(raDeg, decDeg);
}
