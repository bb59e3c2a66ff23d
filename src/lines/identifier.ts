/**
 * Tokenizer for line identifiers such as `h2_v0_j2__v0_j0`.
 *
 * An identifier is `<species>_<upper level>__<lower level>`. The species may
 * itself contain underscores (`c_18o`, `h2_18o`), so the species/transition
 * boundary is found from the species table rather than at a fixed position.
 */

import { malformedIdentifier } from '../shared/index.js';
import {
  DEFAULT_SYMBOL_TABLES,
  ELECTRONIC_PREFIX,
  ENERGY_KEYS,
  LITERAL_KEYS,
  isKnownSpecies,
  resolveSpecies,
  type SymbolTables,
} from './symbolTables.js';

const LEVEL_SEPARATOR = '__';
const PART_SEPARATOR = '_';

export type LevelValue =
  | { kind: 'integer'; value: number }
  | { kind: 'fraction'; numerator: number; denominator: number }
  | { kind: 'decimal'; text: string };

export interface EnergyToken {
  type: 'energy';
  key: string;
  value: LevelValue;
  raw: string;
}

export interface ElectronicToken {
  type: 'electronic';
  /** State label, e.g. `s`, `p`, `po`. */
  state: string;
  /** Principal level digits; empty when the identifier omits them. */
  level: string;
  /** Energy tokens that follow the state inside the same level. */
  scoped: EnergyToken[];
  raw: string;
}

export interface LiteralToken {
  type: 'literal';
  key: string;
  raw: string;
}

export type LevelToken = EnergyToken | ElectronicToken | LiteralToken;

export interface SpeciesAndTransition {
  /** Canonical species (aliases resolved). */
  species: string;
  transition: string;
}

export interface ParsedLine {
  identifier: string;
  species: string;
  /** Species spelling as it appeared in the identifier, lower-cased. */
  speciesSegment: string;
  transition: string;
  upper: LevelToken[];
  lower: LevelToken[];
}

const ENERGY_PATTERN = new RegExp(`^(${ENERGY_KEYS.join('|')})(\\d+)(?:d(\\d+))?$`);
const ELECTRONIC_PATTERN = new RegExp(`^${ELECTRONIC_PREFIX}(\\d*)([a-z]+)$`);
const DIGITS_PATTERN = /^\d+$/;

export function normalizeIdentifier(identifier: string): string {
  return identifier.trim().toLowerCase();
}

/** True if `part` can start a level: an energy token, an electronic token or a known flag. */
export function opensLevel(part: string): boolean {
  return ENERGY_PATTERN.test(part) || ELECTRONIC_PATTERN.test(part) || LITERAL_KEYS.includes(part);
}

function splitOnce(identifier: string, text: string): [string, string] {
  const pieces = text.split(LEVEL_SEPARATOR);
  if (pieces.length !== 2) {
    throw malformedIdentifier(
      `${identifier} is not a valid line: expected exactly one "${LEVEL_SEPARATOR}" between upper and lower levels, found ${pieces.length - 1}`,
      { identifier },
    );
  }
  const [upper = '', lower = ''] = pieces;
  return [upper, lower];
}

function splitSpecies(
  identifier: string,
  tables: SymbolTables,
): { speciesSegment: string; species: string; transition: string } {
  const normalized = normalizeIdentifier(identifier);
  const [upperHalf, lowerHalf] = splitOnce(identifier, normalized);
  const parts = upperHalf.split(PART_SEPARATOR);
  if (parts.some(part => part.length === 0)) {
    throw malformedIdentifier(`${identifier} is not a valid line: empty segment before "${LEVEL_SEPARATOR}"`, { identifier });
  }

  const boundary = parts.findIndex((part, index) => index > 0 && opensLevel(part));
  if (boundary < 0) {
    throw malformedIdentifier(`${identifier} is not a valid line: no transition found after the species`, { identifier });
  }

  let speciesLength = boundary;
  for (let length = boundary; length >= 1; length--) {
    if (isKnownSpecies(parts.slice(0, length).join(PART_SEPARATOR), tables)) {
      speciesLength = length;
      break;
    }
  }

  const speciesSegment = parts.slice(0, speciesLength).join(PART_SEPARATOR);
  const upper = parts.slice(speciesLength).join(PART_SEPARATOR);
  return {
    speciesSegment,
    species: resolveSpecies(speciesSegment, tables),
    transition: `${upper}${LEVEL_SEPARATOR}${lowerHalf}`,
  };
}

export function splitSpeciesAndTransition(
  identifier: string,
  tables: SymbolTables = DEFAULT_SYMBOL_TABLES,
): SpeciesAndTransition {
  const { species, transition } = splitSpecies(identifier, tables);
  return { species, transition };
}

export function speciesOf(identifier: string, tables: SymbolTables = DEFAULT_SYMBOL_TABLES): string {
  return splitSpecies(identifier, tables).species;
}

export function transitionOf(identifier: string, tables: SymbolTables = DEFAULT_SYMBOL_TABLES): string {
  return splitSpecies(identifier, tables).transition;
}

export function splitTransition(transition: string): [string, string] {
  const [upper, lower] = splitOnce(transition, normalizeIdentifier(transition));
  if (upper.length === 0 || lower.length === 0) {
    throw malformedIdentifier(`${transition} is not a valid transition: empty ${upper.length === 0 ? 'upper' : 'lower'} level`, {
      transition,
    });
  }
  return [upper, lower];
}

function gcd(a: bigint, b: bigint): bigint {
  return b === 0n ? a : gcd(b, a % b);
}

function safeNumber(value: bigint, part: string, segment: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw malformedIdentifier(`${segment} is not a valid level: ${part} is out of range`, { level: segment });
  }
  return Number(value);
}

function reduce(numerator: bigint, denominator: bigint, part: string, segment: string): LevelValue {
  const divisor = gcd(numerator, denominator);
  const n = safeNumber(numerator / divisor, part, segment);
  const d = safeNumber(denominator / divisor, part, segment);
  return d === 1 ? { kind: 'integer', value: n } : { kind: 'fraction', numerator: n, denominator: d };
}

// Whole numbers and halves become exact values; any other decimal keeps its digits.
function parseDecimal(whole: string, fractional: string, part: string, segment: string): LevelValue {
  const scale = 10n ** BigInt(fractional.length);
  const numerator = BigInt(whole) * scale + BigInt(fractional);
  const divisor = gcd(numerator, scale);
  const denominator = scale / divisor;
  if (denominator !== 1n && denominator !== 2n) {
    return { kind: 'decimal', text: `${BigInt(whole)}.${fractional}` };
  }
  return reduce(numerator, scale, part, segment);
}

function parseEnergyPart(part: string, denominatorPart: string | undefined, segment: string): EnergyToken | undefined {
  const match = ENERGY_PATTERN.exec(part);
  if (!match) return undefined;
  const [, key = '', whole = '', fractional] = match;

  if (fractional !== undefined) {
    return { type: 'energy', key, value: parseDecimal(whole, fractional, part, segment), raw: part };
  }
  if (denominatorPart !== undefined) {
    const raw = `${part}${PART_SEPARATOR}${denominatorPart}`;
    const denominator = BigInt(denominatorPart);
    if (denominator === 0n) {
      throw malformedIdentifier(`${segment} is not a valid level: zero denominator in ${raw}`, { level: segment });
    }
    return { type: 'energy', key, value: reduce(BigInt(whole), denominator, raw, segment), raw };
  }
  return { type: 'energy', key, value: { kind: 'integer', value: safeNumber(BigInt(whole), part, segment) }, raw: part };
}

/**
 * Split one level (`v0_j2`, `el3d_j5_2`, `pp_fif1`) into tokens, left to right.
 * An electronic token absorbs the energy tokens that follow it up to the next
 * non-energy part: another `el` state or a flag such as `pp`. Energy tokens
 * after a flag stay at the top level, so `el2po_pp_j1` keeps `j1` outside the
 * state and every token's `raw` spelling stays in identifier order.
 */
export function tokenizeLevel(segment: string): LevelToken[] {
  const parts = normalizeIdentifier(segment).split(PART_SEPARATOR);
  if (parts.some(part => part.length === 0)) {
    throw malformedIdentifier(`${segment} is not a valid level: empty part`, { level: segment });
  }

  const tokens: LevelToken[] = [];
  let electronic: ElectronicToken | undefined;
  let index = 0;

  while (index < parts.length) {
    const part = parts[index] ?? '';
    const next = parts[index + 1];
    const denominatorPart = next !== undefined && DIGITS_PATTERN.test(next) ? next : undefined;

    const energy = parseEnergyPart(part, denominatorPart, segment);
    if (energy) {
      if (electronic) {
        electronic.scoped.push(energy);
        electronic.raw = `${electronic.raw}${PART_SEPARATOR}${energy.raw}`;
      } else {
        tokens.push(energy);
      }
      index += energy.raw === part ? 1 : 2;
      continue;
    }

    electronic = undefined;
    const state = ELECTRONIC_PATTERN.exec(part);
    if (state) {
      const [, level = '', label = ''] = state;
      electronic = { type: 'electronic', state: label, level, scoped: [], raw: part };
      tokens.push(electronic);
    } else {
      tokens.push({ type: 'literal', key: part, raw: part });
    }
    index += 1;
  }

  return tokens;
}

export function parseLine(identifier: string, tables: SymbolTables = DEFAULT_SYMBOL_TABLES): ParsedLine {
  const { species, speciesSegment, transition } = splitSpecies(identifier, tables);
  const [upper, lower] = splitTransition(transition);
  return {
    identifier: normalizeIdentifier(identifier),
    species,
    speciesSegment,
    transition,
    upper: tokenizeLevel(upper),
    lower: tokenizeLevel(lower),
  };
}

export function serializeLevel(tokens: readonly LevelToken[]): string {
  return tokens.map(token => token.raw).join(PART_SEPARATOR);
}

export function formatIdentifier(species: string, upper: readonly LevelToken[], lower: readonly LevelToken[]): string {
  return `${species}${PART_SEPARATOR}${serializeLevel(upper)}${LEVEL_SEPARATOR}${serializeLevel(lower)}`;
}

/** Spelling-independent key for a value: `j5_2` and `j2d5` compare equal. */
export function valueKey(value: LevelValue): string {
  switch (value.kind) {
    case 'integer':
      return String(value.value);
    case 'fraction':
      return `${value.numerator}/${value.denominator}`;
    case 'decimal':
      return value.text;
  }
}

export function tokenKey(token: LevelToken): string {
  switch (token.type) {
    case 'energy':
      return `${token.key}=${valueKey(token.value)}`;
    case 'electronic':
      return [`${ELECTRONIC_PREFIX}:${token.level}${token.state}`, ...token.scoped.map(tokenKey)].join(',');
    case 'literal':
      return `!${token.key}`;
  }
}
