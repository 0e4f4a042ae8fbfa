// survey/catalog.ts - Static ranked registry of imaging surveys

import {
  ValidationError,
  type ResolvedCoordinate,
  type SurveySelection,
} from "@skycut/contracts";
import type { SurveyCandidate, SurveyDefinition, SurveyDescriptor } from "./types";

// =============================================================================
// Constants
// =============================================================================

const LEGACY_VIEWER_URL = "https://www.legacysurvey.org/viewer/cutout.jpg";
const PS1_FITSCUT_URL = "https://ps1images.stsci.edu/cgi-bin/fitscut.cgi";

export const DEFAULT_CUTOUT_SIZE = 256;

export const DEFAULT_SURVEYS: readonly SurveyDefinition[] = [
  {
    id: "ls-dr10",
    description: "Legacy Surveys DR10",
    bands: ["g", "r", "z"],
    priority: 100,
    decRange: [-70, 90],
    endpoint: { kind: "legacy", baseUrl: LEGACY_VIEWER_URL, layer: "ls-dr10" },
    defaultPixscale: 0.262,
    maxSize: 3000,
  },
  {
    id: "ls-dr9",
    description: "Legacy Surveys DR9",
    bands: ["g", "r", "z"],
    priority: 90,
    decRange: [-70, 90],
    endpoint: { kind: "legacy", baseUrl: LEGACY_VIEWER_URL, layer: "ls-dr9" },
    defaultPixscale: 0.262,
    maxSize: 3000,
  },
  {
    id: "panstarrs",
    description: "Pan-STARRS1 3pi",
    bands: ["g", "r", "i", "z", "y"],
    priority: 80,
    decRange: [-30, 90],
    endpoint: { kind: "panstarrs", baseUrl: PS1_FITSCUT_URL },
    defaultPixscale: 0.25,
    maxSize: 1200,
  },
  {
    id: "sdss",
    description: "Sloan Digital Sky Survey",
    bands: ["u", "g", "r", "i", "z"],
    priority: 70,
    decRange: [-20, 70],
    endpoint: { kind: "legacy", baseUrl: LEGACY_VIEWER_URL, layer: "sdss" },
    defaultPixscale: 0.396,
    maxSize: 3000,
  },
  {
    id: "des-dr1",
    description: "Dark Energy Survey DR1",
    bands: ["g", "r", "i", "z", "Y"],
    priority: 60,
    decRange: [-65, 5],
    endpoint: { kind: "legacy", baseUrl: LEGACY_VIEWER_URL, layer: "des-dr1" },
    defaultPixscale: 0.262,
    maxSize: 3000,
  },
  {
    id: "unwise-neo7",
    description: "unWISE NEOWISE year 7",
    bands: ["W1", "W2"],
    priority: 20,
    decRange: [-90, 90],
    endpoint: { kind: "legacy", baseUrl: LEGACY_VIEWER_URL, layer: "unwise-neo7" },
    defaultPixscale: 2.75,
    maxSize: 3000,
  },
  {
    id: "galex",
    description: "GALEX all-sky",
    bands: ["FUV", "NUV"],
    priority: 10,
    decRange: [-90, 90],
    endpoint: { kind: "legacy", baseUrl: LEGACY_VIEWER_URL, layer: "galex" },
    defaultPixscale: 1.5,
    maxSize: 3000,
  },
];

// =============================================================================
// Descriptor construction
// =============================================================================

export function buildDescriptor(def: SurveyDefinition): SurveyDescriptor {
  const [minDec, maxDec] = def.decRange;
  if (!(minDec <= maxDec) || def.defaultPixscale <= 0 || def.maxSize < 1) {
    throw new ValidationError(`Invalid survey definition "${def.id}"`, {
      details: { decRange: def.decRange, defaultPixscale: def.defaultPixscale, maxSize: def.maxSize },
    });
  }
  return Object.freeze({
    id: def.id,
    description: def.description,
    bands: new Set(def.bands),
    priority: def.priority,
    decRange: Object.freeze([minDec, maxDec] as const),
    endpoint: Object.freeze({ ...def.endpoint }),
    defaultPixscale: def.defaultPixscale,
    defaultSize: def.defaultSize ?? DEFAULT_CUTOUT_SIZE,
    maxSize: def.maxSize,
    coverage: (dec: number) => dec >= minDec && dec <= maxDec,
  });
}

// =============================================================================
// Catalog
// =============================================================================

export class SurveyCatalog {
  private readonly ordered: readonly SurveyDescriptor[];
  private readonly byId: ReadonlyMap<string, SurveyDescriptor>;

  constructor(definitions: readonly SurveyDefinition[] = DEFAULT_SURVEYS) {
    const byId = new Map<string, SurveyDescriptor>();
    const declared: SurveyDescriptor[] = [];
    for (const def of definitions) {
      const key = def.id.toLowerCase();
      if (byId.has(key)) {
        throw new ValidationError(`Duplicate survey id "${def.id}"`);
      }
      const descriptor = buildDescriptor(def);
      byId.set(key, descriptor);
      declared.push(descriptor);
    }
    // Array#sort is stable, so equal priorities keep declaration order
    this.ordered = Object.freeze(declared.sort((a, b) => b.priority - a.priority));
    this.byId = byId;
    Object.freeze(this);
  }

  /** Case-insensitive lookup. Throws ValidationError(UNKNOWN_SURVEY). */
  get(id: string): SurveyDescriptor {
    const descriptor = this.byId.get(id.trim().toLowerCase());
    if (!descriptor) {
      throw new ValidationError(
        `Unknown survey "${id}". Valid surveys: ${this.ids().join(", ")}`,
        { code: "UNKNOWN_SURVEY", details: { survey: id, valid: this.ids() } },
      );
    }
    return descriptor;
  }

  has(id: string): boolean {
    return this.byId.has(id.trim().toLowerCase());
  }

  /** All descriptors, highest priority first */
  list(): readonly SurveyDescriptor[] {
    return this.ordered;
  }

  ids(): string[] {
    return this.ordered.map((s) => s.id);
  }

  /** Throws for anything but "auto" or a known id. */
  checkSelection(selection: SurveySelection): void {
    if (!isAuto(selection)) this.get(selection);
  }

  /**
   * Fallback attempt order for a coordinate.
   *
   *   auto / undefined        → every covering survey, by priority
   *   explicit, covers        → [that survey] only
   *   explicit, doesn't cover → [that survey (covered: false)], then every
   *                             other covering survey by priority
   */
  candidates(coord: ResolvedCoordinate, requested?: SurveySelection): SurveyCandidate[] {
    const covering = this.ordered.filter((s) => s.coverage(coord.dec));
    if (requested === undefined || isAuto(requested)) {
      return covering.map((survey) => ({ survey, covered: true }));
    }

    const survey = this.get(requested);
    if (survey.coverage(coord.dec)) {
      return [{ survey, covered: true }];
    }
    return [
      { survey, covered: false },
      ...covering.map((s) => ({ survey: s, covered: true })),
    ];
  }
}

function isAuto(selection: SurveySelection): boolean {
  return selection.trim().toLowerCase() === "auto";
}

export const defaultCatalog = new SurveyCatalog();
