import { malformedIdentifier } from '../shared/index.js';
import {
  formatIdentifier,
  parseLine,
  tokenKey,
  type LevelToken,
  type ParsedLine,
} from './identifier.js';
import { ELECTRONIC_PREFIX, HYPERFINE_KEY } from './symbolTables.js';

function hasHyperfine(tokens: readonly LevelToken[]): boolean {
  return tokens.some(token =>
    (token.type === 'energy' && token.key === HYPERFINE_KEY) ||
    (token.type === 'electronic' && token.scoped.some(scoped => scoped.key === HYPERFINE_KEY)),
  );
}

function stripHyperfine(tokens: readonly LevelToken[]): LevelToken[] {
  const stripped: LevelToken[] = [];
  for (const token of tokens) {
    if (token.type === 'energy' && token.key === HYPERFINE_KEY) continue;
    if (token.type === 'electronic') {
      const scoped = token.scoped.filter(energy => energy.key !== HYPERFINE_KEY);
      stripped.push({ ...token, scoped, raw: [`${ELECTRONIC_PREFIX}${token.level}${token.state}`, ...scoped.map(energy => energy.raw)].join('_') });
      continue;
    }
    stripped.push(token);
  }
  return stripped;
}

function sameSequence(a: readonly LevelToken[], b: readonly LevelToken[]): boolean {
  return a.length === b.length && a.every((token, i) => {
    const other = b[i];
    return other !== undefined && tokenKey(token) === tokenKey(other);
  });
}

function strippedLine(line: ParsedLine): { upper: LevelToken[]; lower: LevelToken[] } {
  return { upper: stripHyperfine(line.upper), lower: stripHyperfine(line.lower) };
}

/** True if either level carries a hyperfine `f` quantum number. */
export function isHyperfineLine(identifier: string): boolean {
  const line = parseLine(identifier);
  return hasHyperfine(line.upper) || hasHyperfine(line.lower);
}

/**
 * True if both identifiers are components of the same hyperfine manifold:
 * same species and identical levels once `f` is removed.
 */
export function isSameHyperfineGroup(a: string, b: string): boolean {
  const lineA = parseLine(a);
  const lineB = parseLine(b);
  if (lineA.species !== lineB.species) return false;
  const strippedA = strippedLine(lineA);
  const strippedB = strippedLine(lineB);
  return sameSequence(strippedA.upper, strippedB.upper) && sameSequence(strippedA.lower, strippedB.lower);
}

export function removeHyperfine(identifier: string): string {
  const line = parseLine(identifier);
  const { upper, lower } = strippedLine(line);
  if (upper.length === 0 || lower.length === 0) {
    throw malformedIdentifier(`${identifier} has no level left once the hyperfine number is removed`, { identifier });
  }
  return formatIdentifier(line.species, upper, lower);
}

function manifoldKey(line: ParsedLine): string {
  const { upper, lower } = strippedLine(line);
  return [line.species, upper.map(tokenKey).join(';'), lower.map(tokenKey).join(';')].join('|');
}

/**
 * Group identifiers by hyperfine manifold, in first-seen order. Each group is
 * keyed by the collapsed form of its first member.
 */
export function hyperfineGroups(identifiers: readonly string[]): Map<string, string[]> {
  const labels = new Map<string, string>();
  const groups = new Map<string, string[]>();
  for (const identifier of identifiers) {
    const key = manifoldKey(parseLine(identifier));
    const label = labels.get(key);
    if (label === undefined) {
      const collapsed = removeHyperfine(identifier);
      labels.set(key, collapsed);
      groups.set(collapsed, [identifier]);
    } else {
      groups.get(label)?.push(identifier);
    }
  }
  return groups;
}
