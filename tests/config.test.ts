import { describe, it, expect } from 'vitest';
import { loadServerConfig } from '../src/config.js';
import { LinesError } from '../src/shared/index.js';

describe('loadServerConfig', () => {
  it('defaults to standard tools and no render overrides', () => {
    expect(loadServerConfig({})).toEqual({ toolMode: 'standard', renderDefaults: {} });
  });

  it('reads render defaults from PDR_LINES_* variables', () => {
    expect(loadServerConfig({
      PDR_LINES_TOOL_MODE: 'FULL',
      PDR_LINES_MATH_MODE: '0',
      PDR_LINES_SUPPRESS: 'v, f,',
      PDR_LINES_ROTATIONAL_ONLY: 'true',
      PDR_LINES_SUPPRESS_LITERALS: 'no',
    })).toEqual({
      toolMode: 'full',
      renderDefaults: {
        mathMode: false,
        suppressedLabels: ['v', 'f'],
        rotationalOnly: true,
        suppressLiterals: false,
      },
    });
  });

  it('ignores blank variables', () => {
    expect(loadServerConfig({ PDR_LINES_MATH_MODE: '  ' }).renderDefaults).toEqual({});
  });

  it('rejects values it cannot read', () => {
    expect(() => loadServerConfig({ PDR_LINES_MATH_MODE: 'maybe' })).toThrow(LinesError);
    expect(() => loadServerConfig({ PDR_LINES_TOOL_MODE: 'everything' })).toThrow('Invalid PDR_LINES_* environment configuration');
  });
});
