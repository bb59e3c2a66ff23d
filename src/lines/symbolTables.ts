/**
 * Display fragments for the Meudon PDR line naming convention.
 *
 * Templates are LaTeX fragments without math delimiters; the renderer adds
 * `$…$` around each fragment when math mode is on. Slots:
 *   - `{value}`  energy templates, replaced by the rendered quantum number
 *   - `{level}`  electronic templates, replaced by the principal level
 */

export const ELECTRONIC_PREFIX = 'el' as const;
export const HYPERFINE_KEY = 'f' as const;
export const ROTATIONAL_KEY = 'j' as const;

/** Energy keys recognised by the tokenizer, longest first so `fif1` never reads as `f`. */
export const ENERGY_KEYS: readonly string[] = ['fif', 'ka', 'kc', 'j', 'v', 'n', 'f'];

/** Flag-like parts that open a level without carrying a number. */
export const LITERAL_KEYS: readonly string[] = ['pp', 'pm'];

export const SPECIES_TO_LATEX: Readonly<Record<string, string>> = Object.freeze({
  h: 'H',
  h2: 'H_2',
  hd: 'HD',
  co: 'CO',
  '13c_o': '^{13}CO',
  c_18o: 'C^{18}O',
  '13c_18o': '^{13}C^{18}O',
  c: 'C',
  n: 'N',
  o: 'O',
  s: 'S',
  si: 'Si',
  cs: 'CS',
  cn: 'CN',
  hcn: 'HCN',
  hnc: 'HNC',
  oh: 'OH',
  h2o: 'H_2O',
  h2_18o: 'H_2^{18}O',
  c2h: 'C_2H',
  c_c3h2: 'c-C_3H_2',
  so: 'SO',
  cp: 'C^+',
  sp: 'S^+',
  hcop: 'HCO^+',
  chp: 'CH^+',
  ohp: 'OH^+',
  shp: 'SH^+',
});

export const SPECIES_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  '13co': '13c_o',
  c18o: 'c_18o',
  '13c18o': '13c_18o',
  cc3h2: 'c_c3h2',
});

export const ENERGY_LABEL_TEMPLATES: Readonly<Record<string, string>> = Object.freeze({
  j: 'J={value}',
  v: '\\nu={value}',
  n: 'n={value}',
  f: 'f={value}',
  ka: 'k_a={value}',
  kc: 'k_c={value}',
  fif: 'F_{{value}}',
});

export const ELECTRONIC_TEMPLATES: Readonly<Record<string, string>> = Object.freeze({
  s: '{level}s',
  p: '{level}p',
  d: '{level}d',
  so: '{level}s^o',
  po: '{level}p^o',
  do: '{level}d^o',
});

export const LITERAL_TEMPLATES: Readonly<Record<string, string>> = Object.freeze({
  pp: '+',
  pm: '-',
});

export interface SymbolTables {
  species: Readonly<Record<string, string>>;
  aliases: Readonly<Record<string, string>>;
  energy: Readonly<Record<string, string>>;
  electronic: Readonly<Record<string, string>>;
  literal: Readonly<Record<string, string>>;
}

export const DEFAULT_SYMBOL_TABLES: SymbolTables = Object.freeze({
  species: SPECIES_TO_LATEX,
  aliases: SPECIES_ALIASES,
  energy: ENERGY_LABEL_TEMPLATES,
  electronic: ELECTRONIC_TEMPLATES,
  literal: LITERAL_TEMPLATES,
});

function lookup(table: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

export function speciesTemplate(species: string, tables: SymbolTables = DEFAULT_SYMBOL_TABLES): string | undefined {
  return lookup(tables.species, species);
}

export function energyTemplate(key: string, tables: SymbolTables = DEFAULT_SYMBOL_TABLES): string | undefined {
  return lookup(tables.energy, key);
}

export function electronicTemplate(state: string, tables: SymbolTables = DEFAULT_SYMBOL_TABLES): string | undefined {
  return lookup(tables.electronic, state);
}

export function literalTemplate(key: string, tables: SymbolTables = DEFAULT_SYMBOL_TABLES): string | undefined {
  return lookup(tables.literal, key);
}

/** Trim, lower-case and map an alias to its canonical species. Unknown names pass through. */
export function resolveSpecies(name: string, tables: SymbolTables = DEFAULT_SYMBOL_TABLES): string {
  const normalized = name.trim().toLowerCase();
  return lookup(tables.aliases, normalized) ?? normalized;
}

export function isKnownSpecies(name: string, tables: SymbolTables = DEFAULT_SYMBOL_TABLES): boolean {
  return speciesTemplate(resolveSpecies(name, tables), tables) !== undefined;
}

export function knownSpecies(tables: SymbolTables = DEFAULT_SYMBOL_TABLES): string[] {
  return Object.keys(tables.species);
}
