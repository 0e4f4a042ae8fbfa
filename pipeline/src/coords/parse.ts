// coords/parse.ts - Classify a raw target token as a coordinate pair or a name
//
// Recognized forms, tried in order:
//   "150.0 2.2", "150.0, 2.2"          decimal degrees
//   "10:00:00 +02:12:00"                sexagesimal, RA in hours
//   "10 00 00 +02 12 00"                space-delimited sexagesimal
//   "10h00m00s +02d12m00s"              letter-delimited sexagesimal
// Unicode minus signs and a trailing separator are tolerated.
// Anything else is an object name.

import {
  CoordinateParseError,
  isValidDec,
  isValidRa,
  type Target,
} from "@skycut/contracts";

const NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

const RA_SEXAGESIMAL = String.raw`(\d{1,2})\s*[h:\s]\s*(\d{1,2})\s*[m:\s]\s*(\d{1,2}(?:\.\d*)?)s?`;
const DEC_SEXAGESIMAL = String.raw`([+-]?)(\d{1,3})\s*[d°:\s]\s*(\d{1,2})\s*[m':\s]\s*(\d{1,2}(?:\.\d*)?)(?:s|")?`;
const SEXAGESIMAL = new RegExp(`^${RA_SEXAGESIMAL}(?:\\s*,\\s*|\\s+)${DEC_SEXAGESIMAL}$`, "i");

/** Parse one raw token. Throws CoordinateParseError for empty or out-of-range input. */
export function parseTarget(raw: string): Target {
  const text = raw.trim();
  if (text === "") {
    throw new CoordinateParseError(raw, "empty input");
  }

  const coordText = text.replace(/\u2212/g, "-").replace(/\s*,$/, "");

  const decimal = parseDecimalPair(raw, coordText);
  if (decimal) return decimal;

  const sexagesimal = parseSexagesimal(raw, coordText);
  if (sexagesimal) return sexagesimal;

  return { kind: "name", name: text, raw };
}

function parseDecimalPair(raw: string, text: string): Target | null {
  const tokens = text.split(/\s*,\s*|\s+/);
  if (tokens.length !== 2) return null;
  const [raToken, decToken] = tokens;
  if (raToken === undefined || decToken === undefined) return null;
  if (!NUMBER.test(raToken) || !NUMBER.test(decToken)) return null;
  return checkedCoordinate(raw, Number(raToken), Number(decToken));
}

function parseSexagesimal(raw: string, text: string): Target | null {
  const match = SEXAGESIMAL.exec(text);
  if (!match) return null;
  const [, hh, mm, ss, sign, dd, am, as] = match;

  const hours = Number(hh);
  const minutes = Number(mm);
  const seconds = Number(ss);
  const degrees = Number(dd);
  const arcmin = Number(am);
  const arcsec = Number(as);

  if (hours >= 24) throw new CoordinateParseError(raw, `RA hours ${hours} must be < 24`);
  if (minutes >= 60 || seconds >= 60) {
    throw new CoordinateParseError(raw, "RA minutes and seconds must be < 60");
  }
  if (arcmin >= 60 || arcsec >= 60) {
    throw new CoordinateParseError(raw, "Dec arcminutes and arcseconds must be < 60");
  }

  const ra = (hours + minutes / 60 + seconds / 3600) * 15;
  const magnitude = degrees + arcmin / 60 + arcsec / 3600;
  // Sign lives on the whole value so "-00:30:00" stays negative
  const dec = sign === "-" ? -magnitude : magnitude;
  return checkedCoordinate(raw, ra, dec);
}

function checkedCoordinate(raw: string, ra: number, dec: number): Target {
  if (!isValidRa(ra)) {
    throw new CoordinateParseError(raw, `RA ${ra} outside [0, 360)`);
  }
  if (!isValidDec(dec)) {
    throw new CoordinateParseError(raw, `Dec ${dec} outside [-90, 90]`);
  }
  return { kind: "coordinate", ra, dec, raw };
}
