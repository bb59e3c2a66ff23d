export {
  DEFAULT_SYMBOL_TABLES,
  ELECTRONIC_PREFIX,
  ENERGY_KEYS,
  HYPERFINE_KEY,
  LITERAL_KEYS,
  ROTATIONAL_KEY,
  SPECIES_ALIASES,
  SPECIES_TO_LATEX,
  isKnownSpecies,
  knownSpecies,
  resolveSpecies,
} from './symbolTables.js';
export type { SymbolTables } from './symbolTables.js';
export {
  formatIdentifier,
  normalizeIdentifier,
  parseLine,
  serializeLevel,
  speciesOf,
  splitSpeciesAndTransition,
  splitTransition,
  tokenizeLevel,
  transitionOf,
} from './identifier.js';
export type {
  ElectronicToken,
  EnergyToken,
  LevelToken,
  LevelValue,
  LiteralToken,
  ParsedLine,
  SpeciesAndTransition,
} from './identifier.js';
export { hyperfineGroups, isHyperfineLine, isSameHyperfineGroup, removeHyperfine } from './hyperfine.js';
export { renderLevelPair, renderLine, renderSpecies, renderTransition, renderValue } from './render.js';
export {
  DEFAULT_RENDER_OPTIONS,
  RenderOptionsSchema,
  mergeRenderOptions,
  resolveRenderOptions,
} from './options.js';
export type { RenderOptions, RenderOptionsInput } from './options.js';
export { filterBySpecies, isLineOf, moleculesAmong } from './collections.js';
export { LinesError, isLinesError } from '../shared/index.js';
export type { ErrorCode } from '../shared/index.js';
