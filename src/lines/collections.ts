import { speciesOf } from './identifier.js';
import { resolveSpecies } from './symbolTables.js';

/** Canonical species of `identifiers`, without duplicates, in first-seen order. */
export function moleculesAmong(identifiers: readonly string[]): string[] {
  return [...new Set(identifiers.map(identifier => speciesOf(identifier)))];
}

export function isLineOf(identifier: string, species: string): boolean {
  return speciesOf(identifier) === resolveSpecies(species);
}

/**
 * Keep the identifiers whose species is one of `species` (aliases accepted).
 * `undefined` keeps everything.
 */
export function filterBySpecies(
  identifiers: readonly string[],
  species: string | readonly string[] | undefined,
): string[] {
  if (species === undefined) return [...identifiers];
  const targets = new Set((typeof species === 'string' ? [species] : species).map(name => resolveSpecies(name)));
  return identifiers.filter(identifier => targets.has(speciesOf(identifier)));
}
