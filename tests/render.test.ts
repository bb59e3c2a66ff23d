import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SYMBOL_TABLES,
  LinesError,
  SPECIES_ALIASES,
  isKnownSpecies,
  knownSpecies,
  mergeRenderOptions,
  renderLevelPair,
  renderLine,
  renderSpecies,
  renderTransition,
  renderValue,
  resolveRenderOptions,
  resolveSpecies,
  tokenizeLevel,
} from '../src/lines/index.js';

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof LinesError ? err.code : 'NOT_A_LINES_ERROR';
  }
  return undefined;
}

describe('renderLine', () => {
  it('hoists levels shared by both states in front of the transition', () => {
    expect(renderLine('h2_v0_j2__v0_j0')).toBe('$H_2$ $\\nu=0$ ($J=2$ $\\to$ $J=0$)');
  });

  it('lists every changing quantum number', () => {
    expect(renderLine('h2o_j1_ka1_kc1__j0_ka0_kc0'))
      .toBe('$H_2O$ ($J=1$, $k_a=1$, $k_c=1$ $\\to$ $J=0$, $k_a=0$, $k_c=0$)');
  });

  it('renders electronic states with their half-integer J', () => {
    expect(renderLine('h_el3d_j5_2__el1s_j1_2'))
      .toBe('$H$ ($3d$, $J=\\frac{5}{2}$ $\\to$ $1s$, $J=\\frac{1}{2}$)');
  });

  it('hoists an unchanged electronic state', () => {
    expect(renderLine('c_el2p_j1__el2p_j0')).toBe('$C$ $2p$ ($J=1$ $\\to$ $J=0$)');
  });

  it('renders decimal hyperfine numbers as fractions', () => {
    expect(renderLine('shp_n10_j10_f9d5__n9_j10_f9d5'))
      .toBe('$SH^+$ $J=10$ $f=\\frac{19}{2}$ ($n=10$ $\\to$ $n=9$)');
  });

  it('pairs parity flags with each other', () => {
    expect(renderLine('oh_j1d5_pp_fif1__j1d5_pm_fif1'))
      .toBe('$OH$ $J=\\frac{3}{2}$ $F_{1}$ ($+$ $\\to$ $-$)');
  });

  it('keeps other decimals as written', () => {
    expect(renderLine('h2_v0_j2d25__v0_j1')).toBe('$H_2$ $\\nu=0$ ($J=2.25$ $\\to$ $J=1$)');
  });

  it('renders aliases like their canonical species', () => {
    expect(renderLine('13co_j1__j0')).toBe('$^{13}CO$ ($J=1$ $\\to$ $J=0$)');
  });

  it('fails on an unknown species', () => {
    expect(errorCode(() => renderLine('xyz_j1__j0'))).toBe('UNKNOWN_SPECIES');
  });

  it('rejects quantum numbers it cannot represent exactly', () => {
    expect(errorCode(() => renderLine('h2_v0_j123456789012345678901__v0_j0'))).toBe('MALFORMED_IDENTIFIER');
  });

  it('splits and renders species added through custom tables', () => {
    const tables = { ...DEFAULT_SYMBOL_TABLES, species: { ...DEFAULT_SYMBOL_TABLES.species, h2_x: 'H_2X' } };
    expect(renderLine('h2_x_j1__j0', {}, tables)).toBe('$H_2X$ ($J=1$ $\\to$ $J=0$)');
  });

  it('fails on a flag with no template', () => {
    expect(errorCode(() => renderLine('h2_j1_x2__j0_x1'))).toBe('UNKNOWN_ENERGY_LABEL');
  });

  it('fails on a malformed identifier', () => {
    expect(errorCode(() => renderLine('h2_v0_j2'))).toBe('MALFORMED_IDENTIFIER');
  });
});

describe('render options', () => {
  it('keeps only J in rotational-only mode', () => {
    expect(renderLine('h2_v0_j2__v0_j0', { rotationalOnly: true })).toBe('$H_2$ ($J=2$ $\\to$ $J=0$)');
  });

  it('drops math delimiters when math mode is off', () => {
    expect(renderLine('h2_v0_j2__v0_j0', { mathMode: false })).toBe('H_2 \\nu=0 (J=2 \\to J=0)');
    expect(renderLine('h_el3d_j5_2__el1s_j1_2', { mathMode: false }))
      .toBe('H (3d, J=\\frac{5}{2} \\to 1s, J=\\frac{1}{2})');
  });

  it('suppresses listed energy labels', () => {
    expect(renderLine('shp_n10_j10_f9d5__n9_j10_f9d5', { suppressedLabels: ['f'] }))
      .toBe('$SH^+$ $J=10$ ($n=10$ $\\to$ $n=9$)');
  });

  it('suppresses labels case-insensitively', () => {
    expect(renderLine('h2_v0_j2__v0_j0', { suppressedLabels: ['V'] })).toBe('$H_2$ ($J=2$ $\\to$ $J=0$)');
  });

  it('renders an empty group when nothing changes', () => {
    expect(renderLine('h2_v1_j2__v0_j2', { suppressedLabels: ['v'], mathMode: false })).toBe('H_2 J=2 ( \\to )');
    expect(renderLine('h2_v1_j2__v0_j2', { suppressedLabels: ['v'] })).toBe('$H_2$ $J=2$ ( $\\to$ )');
  });

  it('drops electronic states on request', () => {
    expect(renderLine('h_el3d_j5_2__el1s_j1_2', { suppressElectronic: true }))
      .toBe('$H$ ($J=\\frac{5}{2}$ $\\to$ $J=\\frac{1}{2}$)');
  });

  it('drops flags on request', () => {
    expect(renderLine('oh_j1d5_pp_fif1__j1d5_pm_fif1', { suppressLiterals: true }))
      .toBe('$OH$ $J=\\frac{3}{2}$ $F_{1}$ ( $\\to$ )');
    expect(renderLine('h2_j1_x2__j0_x1', { suppressLiterals: true })).toBe('$H_2$ ($J=1$ $\\to$ $J=0$)');
  });

  it('skips the template lookup of a suppressed label', () => {
    const tables = { ...DEFAULT_SYMBOL_TABLES, energy: { j: 'J={value}' } };
    expect(errorCode(() => renderTransition('j1_ka1__j0_ka0', {}, tables))).toBe('UNKNOWN_ENERGY_LABEL');
    expect(renderTransition('j1_ka1__j0_ka0', { suppressedLabels: ['ka'] }, tables)).toBe('($J=1$ $\\to$ $J=0$)');
  });

  it('rejects unknown option fields', () => {
    const options: Record<string, never> = JSON.parse('{"mathmode": false}');
    expect(errorCode(() => renderLine('h2_v0_j2__v0_j0', options))).toBe('INVALID_PARAMS');
  });
});

describe('renderSpecies', () => {
  it('renders canonical species', () => {
    expect(renderSpecies('h2o')).toBe('$H_2O$');
    expect(renderSpecies('c_c3h2', { mathMode: false })).toBe('c-C_3H_2');
  });

  it('renders every alias like its canonical species', () => {
    for (const [alias, canonical] of Object.entries(SPECIES_ALIASES)) {
      expect(renderSpecies(alias)).toBe(renderSpecies(canonical));
    }
  });

  it('fails on an unknown species', () => {
    expect(errorCode(() => renderSpecies('unobtainium'))).toBe('UNKNOWN_SPECIES');
  });
});

describe('renderLevelPair', () => {
  it('does not hoist when the levels list different labels', () => {
    expect(renderLevelPair(tokenizeLevel('v1_j2'), tokenizeLevel('j2')))
      .toBe('($\\nu=1$, $J=2$ $\\to$ $J=2$)');
  });

  it('renders one empty side as an empty list', () => {
    expect(renderLevelPair(tokenizeLevel('v1_j2'), tokenizeLevel('v0'), { rotationalOnly: true }))
      .toBe('($J=2$ $\\to$)');
  });
});

describe('renderTransition', () => {
  it('renders a transition without species', () => {
    expect(renderTransition('j1_ka1_kc1__j0_ka0_kc0'))
      .toBe('($J=1$, $k_a=1$, $k_c=1$ $\\to$ $J=0$, $k_a=0$, $k_c=0$)');
  });
});

describe('renderValue', () => {
  it('formats each value shape', () => {
    expect(renderValue({ kind: 'integer', value: 7 })).toBe('7');
    expect(renderValue({ kind: 'fraction', numerator: 3, denominator: 2 })).toBe('\\frac{3}{2}');
    expect(renderValue({ kind: 'decimal', text: '0.25' })).toBe('0.25');
  });
});

describe('resolveRenderOptions', () => {
  it('fills unset fields from the defaults', () => {
    const options = resolveRenderOptions({ rotationalOnly: true, suppressedLabels: [' F '] });
    expect(options.mathMode).toBe(true);
    expect(options.rotationalOnly).toBe(true);
    expect([...options.suppressedLabels]).toEqual(['f']);
    expect(Object.isFrozen(options)).toBe(true);
  });
});

describe('mergeRenderOptions', () => {
  it('overlays only the fields the overrides set', () => {
    expect(mergeRenderOptions({ mathMode: false, suppressedLabels: ['v'] }, { suppressedLabels: ['f'], rotationalOnly: undefined }))
      .toEqual({ mathMode: false, suppressedLabels: ['f'] });
  });
});

describe('species lookups', () => {
  it('resolves aliases and knows canonical names', () => {
    expect(resolveSpecies(' 13CO ')).toBe('13c_o');
    expect(isKnownSpecies('c18o')).toBe(true);
    expect(isKnownSpecies('xyz')).toBe(false);
    expect(knownSpecies()).toContain('h2o');
    expect(knownSpecies()).not.toContain('13co');
  });
});
