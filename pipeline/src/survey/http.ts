// survey/http.ts - HTTP cutout backend for Legacy Survey viewer and Pan-STARRS
//
// Talks to the public JPEG cutout endpoints via fetch() directly. 404 and an
// empty body mean the survey has nothing at that position; 429 and 5xx are
// transient; any other non-2xx or a non-image reply is a hard failure.

import jpeg from "jpeg-js";
import { NetworkError, TIMING, type PixelBuffer } from "@skycut/contracts";
import { mapHttpStatus, withNetworkErrorMapping } from "../net";
import type { CutoutRequest, CutoutResponse, CutoutService } from "./types";

// =============================================================================
// Request building
// =============================================================================

/** Edge length in pixels for a field of view, clamped to [1, maxSize]. */
export function cutoutSize(fovArcmin: number, pixscale: number, maxSize: number): number {
  const pixels = Math.floor((fovArcmin * 60) / pixscale);
  return Math.min(Math.max(pixels, 1), maxSize);
}

export function buildCutoutUrl(request: CutoutRequest): string {
  const { survey, coordinate, size, pixscale } = request;
  const { endpoint } = survey;

  switch (endpoint.kind) {
    case "panstarrs": {
      const params = new URLSearchParams({
        ra: String(coordinate.ra),
        dec: String(coordinate.dec),
        size: String(size),
        format: "jpg",
        output_size: String(size),
        autoscale: "99.5",
        filter: "color",
      });
      return `${endpoint.baseUrl}?${params.toString()}`;
    }
    case "legacy": {
      const params = new URLSearchParams({
        ra: String(coordinate.ra),
        dec: String(coordinate.dec),
        size: String(size),
        pixscale: String(pixscale),
        layer: endpoint.layer ?? survey.id,
      });
      return `${endpoint.baseUrl}?${params.toString()}`;
    }
  }
}

// =============================================================================
// Decoding
// =============================================================================

export function decodeJpeg(service: string, bytes: Uint8Array): PixelBuffer {
  let raw: { width: number; height: number; data: Uint8Array };
  try {
    raw = jpeg.decode(bytes, { useTArray: true, formatAsRGBA: false });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new NetworkError(service, `${service} returned an undecodable image: ${message}`, {
      code: "HTTP_ERROR",
      retryable: false,
      cause: err,
    });
  }
  const pixels = raw.width * raw.height;
  const channels = pixels > 0 ? Math.round(raw.data.length / pixels) : 0;
  return { width: raw.width, height: raw.height, channels, data: raw.data };
}

// =============================================================================
// Service
// =============================================================================

export interface HttpCutoutOptions {
  timeoutMs?: number;
  /** Injectable fetch for testing */
  _fetchImpl?: typeof fetch;
}

export class HttpCutoutService implements CutoutService {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpCutoutOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? TIMING.CUTOUT_TIMEOUT_MS;
    this.fetchImpl = options._fetchImpl ?? globalThis.fetch.bind(globalThis);
  }

  async fetchCutout(request: CutoutRequest): Promise<CutoutResponse> {
    const service = request.survey.id;
    const url = buildCutoutUrl(request);

    const reply = await withNetworkErrorMapping(service, this.timeoutMs, async () => {
      const response = await this.fetchImpl(url, {
        headers: { Accept: "image/jpeg" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        await response.body?.cancel();
        if (response.status === 404) return null;
        throw mapHttpStatus(service, response.status);
      }
      const contentType = response.headers.get("content-type") ?? "";
      const bytes = new Uint8Array(await response.arrayBuffer());
      return { contentType, bytes };
    });

    if (reply === null) return { kind: "not_covered", reason: "HTTP 404" };
    if (reply.bytes.length === 0) return { kind: "not_covered", reason: "empty response body" };
    if (!reply.contentType.toLowerCase().startsWith("image/")) {
      throw new NetworkError(
        service,
        `${service} returned non-image content (${reply.contentType || "no content type"})`,
        { code: "HTTP_ERROR", retryable: false },
      );
    }
    return { kind: "image", image: decodeJpeg(service, reply.bytes) };
  }
}
