// coords/targets.ts - Normalize heterogeneous target inputs

import {
  CoordinateParseError,
  ValidationError,
  formatCoordinate,
  isValidDec,
  isValidRa,
  type Target,
  type TargetInput,
} from "@skycut/contracts";
import { parseTarget } from "./parse";

export interface LabeledTarget {
  target: Target;
  /** Display label: caller-supplied, else the name, else "(ra, dec)" to 4 places */
  label: string;
}

/**
 * Classify one input. Strings go through the parser; numeric pairs and
 * objects skip it but are still range-checked.
 */
export function toTarget(input: TargetInput): LabeledTarget {
  if (typeof input === "string") {
    return withLabel(parseTarget(input));
  }
  if (isPair(input)) {
    const [ra, dec] = input;
    return withLabel(coordinateTarget(ra, dec, `${ra} ${dec}`));
  }
  if ("name" in input) {
    const name = input.name.trim();
    if (name === "") throw new CoordinateParseError(input.name, "empty name");
    return withLabel({ kind: "name", name, raw: input.name }, input.label);
  }
  return withLabel(coordinateTarget(input.ra, input.dec, `${input.ra} ${input.dec}`), input.label);
}

/**
 * Best-effort identity for an input that could not be classified, so the
 * failure can still be reported against the caller's original token.
 */
export function rawTarget(input: TargetInput): LabeledTarget {
  const raw = describeInput(input);
  const label = typeof input === "object" && !isPair(input) && input.label ? input.label : raw;
  return { target: { kind: "name", name: raw, raw }, label };
}

export function describeInput(input: TargetInput): string {
  if (typeof input === "string") return input;
  if (isPair(input)) return `${input[0]} ${input[1]}`;
  if ("name" in input) return input.name;
  return `${input.ra} ${input.dec}`;
}

/**
 * Accept the batch input shapes callers tend to have on hand:
 *   coerceTargets(["M31", "150 2.2", [10.68, 41.27]])
 *   coerceTargets([10.68, 150.0], [41.27, 2.2])       parallel RA/Dec arrays
 */
export function coerceTargets(inputs: readonly TargetInput[]): TargetInput[];
export function coerceTargets(ras: readonly number[], decs: readonly number[]): TargetInput[];
export function coerceTargets(
  inputs: readonly (TargetInput | number)[],
  decs?: readonly number[],
): TargetInput[] {
  if (decs !== undefined) {
    if (decs.length !== inputs.length) {
      throw new ValidationError(
        `RA and Dec arrays differ in length (${inputs.length} vs ${decs.length})`,
      );
    }
    return inputs.map((ra, i): TargetInput => {
      const dec = decs[i];
      if (typeof ra !== "number" || dec === undefined) {
        throw new ValidationError(`Parallel RA/Dec arrays must be numeric (index ${i})`);
      }
      return [ra, dec];
    });
  }
  return inputs.map((input, i): TargetInput => {
    if (typeof input === "number") {
      throw new ValidationError(
        `Bare number at index ${i}; pass [ra, dec] pairs or parallel RA/Dec arrays`,
      );
    }
    return input;
  });
}

// =============================================================================
// Internals
// =============================================================================

function isPair(input: TargetInput): input is readonly [number, number] {
  return Array.isArray(input);
}

function coordinateTarget(ra: number, dec: number, raw: string): Target {
  if (!isValidRa(ra)) throw new CoordinateParseError(raw, `RA ${ra} outside [0, 360)`);
  if (!isValidDec(dec)) throw new CoordinateParseError(raw, `Dec ${dec} outside [-90, 90]`);
  return { kind: "coordinate", ra, dec, raw };
}

function withLabel(target: Target, label?: string): LabeledTarget {
  if (label) return { target, label };
  return {
    target,
    label: target.kind === "name" ? target.name : formatCoordinate(target),
  };
}
