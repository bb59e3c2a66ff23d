/**
 * LaTeX rendering of species, transitions and full lines.
 *
 * Each level is flattened into display items (an electronic token contributes
 * its state followed by its scoped energy tokens), filtered by the options,
 * rendered through the symbol tables, and the two levels are paired by
 * position. Pairs that render identically in both levels are printed once,
 * before the parenthesised transition:
 *
 *   h2_v0_j2__v0_j0  ->  $H_2$ $\nu=0$ ($J=2$ $\to$ $J=0$)
 */

import { unknownEnergyLabel, unknownSpecies } from '../shared/index.js';
import {
  parseLine,
  splitTransition,
  tokenizeLevel,
  type EnergyToken,
  type LevelToken,
  type LevelValue,
} from './identifier.js';
import { resolveRenderOptions, type RenderOptions, type RenderOptionsInput } from './options.js';
import {
  DEFAULT_SYMBOL_TABLES,
  ELECTRONIC_PREFIX,
  ROTATIONAL_KEY,
  electronicTemplate,
  energyTemplate,
  literalTemplate,
  resolveSpecies,
  speciesTemplate,
  type SymbolTables,
} from './symbolTables.js';

const ARROW = '\\to';

type DisplayItem =
  | { kind: 'energy'; token: EnergyToken }
  | { kind: 'electronic'; state: string; level: string }
  | { kind: 'literal'; key: string };

function itemKey(item: DisplayItem): string {
  switch (item.kind) {
    case 'energy':
      return item.token.key;
    case 'electronic':
      return ELECTRONIC_PREFIX;
    case 'literal':
      return item.key;
  }
}

// Flags such as pp/pm occupy one slot whatever their value, so `pp` pairs with `pm`.
function slotKey(item: DisplayItem): string {
  return item.kind === 'literal' ? '#literal' : itemKey(item);
}

function flattenLevel(tokens: readonly LevelToken[]): DisplayItem[] {
  return tokens.flatMap((token): DisplayItem[] => {
    switch (token.type) {
      case 'energy':
        return [{ kind: 'energy', token }];
      case 'electronic':
        return [
          { kind: 'electronic', state: token.state, level: token.level },
          ...token.scoped.map((scoped): DisplayItem => ({ kind: 'energy', token: scoped })),
        ];
      case 'literal':
        return [{ kind: 'literal', key: token.key }];
    }
  });
}

function filterItems(items: DisplayItem[], options: RenderOptions): DisplayItem[] {
  let kept = items.filter(item => !options.suppressedLabels.has(itemKey(item)));
  if (options.suppressElectronic) kept = kept.filter(item => item.kind !== 'electronic');
  if (options.suppressLiterals) kept = kept.filter(item => item.kind !== 'literal');
  if (options.rotationalOnly) kept = kept.filter(item => item.kind === 'energy' && item.token.key === ROTATIONAL_KEY);
  return kept;
}

export function renderValue(value: LevelValue): string {
  switch (value.kind) {
    case 'integer':
      return String(value.value);
    case 'fraction':
      return `\\frac{${value.numerator}}{${value.denominator}}`;
    case 'decimal':
      return value.text;
  }
}

function renderItem(item: DisplayItem, tables: SymbolTables): string {
  switch (item.kind) {
    case 'energy': {
      const template = energyTemplate(item.token.key, tables);
      if (template === undefined) {
        throw unknownEnergyLabel(`No template for energy label "${item.token.key}"`, { key: item.token.key });
      }
      return template.replaceAll('{value}', renderValue(item.token.value));
    }
    case 'electronic': {
      const template = electronicTemplate(item.state, tables);
      if (template === undefined) {
        throw unknownEnergyLabel(`No template for electronic state "${item.state}"`, { key: `${ELECTRONIC_PREFIX}${item.state}` });
      }
      return template.replaceAll('{level}', item.level);
    }
    case 'literal': {
      const template = literalTemplate(item.key, tables);
      if (template === undefined) {
        throw unknownEnergyLabel(`No template for flag "${item.key}"`, { key: item.key });
      }
      return template;
    }
  }
}

function wrap(fragment: string, options: RenderOptions): string {
  return options.mathMode ? `$${fragment}$` : fragment;
}

function sameKeys(upper: readonly DisplayItem[], lower: readonly DisplayItem[]): boolean {
  return upper.length === lower.length && upper.every((item, i) => {
    const other = lower[i];
    return other !== undefined && slotKey(item) === slotKey(other);
  });
}

function renderPair(
  upperTokens: readonly LevelToken[],
  lowerTokens: readonly LevelToken[],
  options: RenderOptions,
  tables: SymbolTables,
): string {
  const upperItems = filterItems(flattenLevel(upperTokens), options);
  const lowerItems = filterItems(flattenLevel(lowerTokens), options);
  const upper = upperItems.map(item => wrap(renderItem(item, tables), options));
  const lower = lowerItems.map(item => wrap(renderItem(item, tables), options));

  const constant: string[] = [];
  const upperVarying: string[] = [];
  const lowerVarying: string[] = [];
  if (sameKeys(upperItems, lowerItems)) {
    upper.forEach((fragment, i) => {
      const other = lower[i] ?? '';
      if (fragment === other) {
        constant.push(fragment);
      } else {
        upperVarying.push(fragment);
        lowerVarying.push(other);
      }
    });
  } else {
    upperVarying.push(...upper);
    lowerVarying.push(...lower);
  }

  const group = upperVarying.length === 0 && lowerVarying.length === 0
    ? ` ${wrap(ARROW, options)} `
    : [upperVarying.join(', '), wrap(ARROW, options), lowerVarying.join(', ')]
      .filter(part => part.length > 0)
      .join(' ');
  return [...constant, `(${group})`].join(' ');
}

export function renderSpecies(
  species: string,
  options: RenderOptionsInput = {},
  tables: SymbolTables = DEFAULT_SYMBOL_TABLES,
): string {
  const resolved = resolveRenderOptions(options);
  const canonical = resolveSpecies(species, tables);
  const template = speciesTemplate(canonical, tables);
  if (template === undefined) {
    throw unknownSpecies(`Unknown species: ${species}`, { species: canonical });
  }
  return wrap(template, resolved);
}

export function renderLevelPair(
  upper: readonly LevelToken[],
  lower: readonly LevelToken[],
  options: RenderOptionsInput = {},
  tables: SymbolTables = DEFAULT_SYMBOL_TABLES,
): string {
  return renderPair(upper, lower, resolveRenderOptions(options), tables);
}

export function renderTransition(
  transition: string,
  options: RenderOptionsInput = {},
  tables: SymbolTables = DEFAULT_SYMBOL_TABLES,
): string {
  const [upper, lower] = splitTransition(transition);
  return renderPair(tokenizeLevel(upper), tokenizeLevel(lower), resolveRenderOptions(options), tables);
}

export function renderLine(
  identifier: string,
  options: RenderOptionsInput = {},
  tables: SymbolTables = DEFAULT_SYMBOL_TABLES,
): string {
  const resolved = resolveRenderOptions(options);
  const line = parseLine(identifier, tables);
  const species = renderSpecies(line.species, options, tables);
  return `${species} ${renderPair(line.upper, line.lower, resolved, tables)}`;
}
