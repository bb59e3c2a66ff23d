import { describe, it, expect } from 'vitest';
import { TOOL_SPECS, getTools } from '../src/tools/registry.js';

describe('line MCP tool contracts', () => {
  it('all tools have valid names', () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.name).toMatch(/^lines_[a-z_]+$/);
    }
  });

  it('all tools have descriptions', () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.description.length).toBeGreaterThan(10);
    }
  });

  it('getTools returns valid MCP tool definitions', () => {
    const tools = getTools('standard');
    const standardCount = TOOL_SPECS.filter(spec => spec.exposure === 'standard').length;
    expect(tools.length).toBe(standardCount);
    for (const tool of tools) {
      expect(tool.inputSchema.type).toBe('object');
      expect(tool.inputSchema.$schema).toBeUndefined();
    }
  });

  it('all tool names are unique', () => {
    const names = TOOL_SPECS.map(s => s.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it('render tools expose the options object', () => {
    const tool = getTools('standard').find(t => t.name === 'lines_render_line');
    expect(tool?.inputSchema.required).toEqual(['identifier']);
    expect(tool?.inputSchema.properties).toHaveProperty('options');
  });

  it('hyperfine grouping is only exposed in full mode', () => {
    expect(getTools('standard').some(t => t.name === 'lines_hyperfine_groups')).toBe(false);
    expect(getTools('full').some(t => t.name === 'lines_hyperfine_groups')).toBe(true);
  });

  it('expected tool counts', () => {
    expect(TOOL_SPECS.length).toBe(13);
    expect(getTools('standard').length).toBe(12);
  });
});
