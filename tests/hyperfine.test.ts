import { describe, it, expect } from 'vitest';
import {
  LinesError,
  hyperfineGroups,
  isHyperfineLine,
  isSameHyperfineGroup,
  normalizeIdentifier,
  removeHyperfine,
} from '../src/lines/index.js';

const SHP_A = 'shp_n10_j10_f9d5__n9_j10_f9d5';
const SHP_B = 'shp_n10_j10_f10d5__n9_j10_f9d5';
const SO = 'so_n7_j6__n6_j6';

describe('isHyperfineLine', () => {
  it('detects an f quantum number', () => {
    expect(isHyperfineLine(SHP_A)).toBe(true);
    expect(isHyperfineLine(SO)).toBe(false);
  });

  it('detects f scoped inside an electronic state', () => {
    expect(isHyperfineLine('h_el3d_j5_2_f2__el1s_j1_2_f1')).toBe(true);
  });

  it('does not mistake fine-structure indices for hyperfine numbers', () => {
    expect(isHyperfineLine('oh_j1d5_pp_fif1__j1d5_pm_fif1')).toBe(false);
  });
});

describe('isSameHyperfineGroup', () => {
  it('matches components that differ only in f', () => {
    expect(isSameHyperfineGroup(SHP_A, SHP_B)).toBe(true);
    expect(isSameHyperfineGroup(SHP_B, SHP_A)).toBe(true);
  });

  it('requires the same species', () => {
    expect(isSameHyperfineGroup(SHP_A, 'ohp_n10_j10_f9d5__n9_j10_f9d5')).toBe(false);
  });

  it('requires the same non-hyperfine levels', () => {
    expect(isSameHyperfineGroup(SHP_A, 'shp_n10_j9_f9d5__n9_j10_f9d5')).toBe(false);
    expect(isSameHyperfineGroup(SHP_A, 'shp_n10_j10_f9d5__n9_j9_f9d5')).toBe(false);
  });

  it('compares values rather than spellings', () => {
    expect(isSameHyperfineGroup('h_el3d_j5_2_f2__el1s_j1_2_f1', 'h_el3d_j2d5_f3__el1s_j0d5_f0')).toBe(true);
  });

  it('treats aliases as their canonical species', () => {
    expect(isSameHyperfineGroup('13co_j1_f1__j0_f0', '13c_o_j1_f2__j0_f1')).toBe(true);
  });
});

describe('removeHyperfine', () => {
  it('drops f from both levels', () => {
    expect(removeHyperfine(SHP_A)).toBe('shp_n10_j10__n9_j10');
  });

  it('drops f scoped inside an electronic state', () => {
    expect(removeHyperfine('h_el3d_j5_2_f2__el1s_j1_2_f1')).toBe('h_el3d_j5_2__el1s_j1_2');
  });

  it('re-serializes lines without f in canonical form', () => {
    expect(removeHyperfine('SO_N7_J6__N6_J6')).toBe(SO);
    expect(removeHyperfine('13co_j1_f1__j0_f0')).toBe('13c_o_j1__j0');
  });

  it('is idempotent', () => {
    for (const identifier of [SHP_A, SHP_B, SO, 'h_el3d_j5_2_f2__el1s_j1_2_f1']) {
      const once = removeHyperfine(identifier);
      expect(removeHyperfine(once)).toBe(once);
    }
  });

  it('changes exactly the hyperfine lines', () => {
    for (const identifier of [SHP_A, SO, 'h2_v0_j2__v0_j0', 'hcn_j1_f2__j0_f1']) {
      expect(removeHyperfine(identifier) !== normalizeIdentifier(identifier)).toBe(isHyperfineLine(identifier));
    }
  });

  it('refuses to leave a level empty', () => {
    expect(() => removeHyperfine('h_f1__f0')).toThrow(LinesError);
  });
});

describe('hyperfineGroups', () => {
  it('groups components by manifold in first-seen order', () => {
    const groups = hyperfineGroups([SHP_A, SO, SHP_B]);
    expect([...groups.entries()]).toEqual([
      ['shp_n10_j10__n9_j10', [SHP_A, SHP_B]],
      [SO, [SO]],
    ]);
  });
});
