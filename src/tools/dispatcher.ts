import { invalidParams, toLinesError } from '../shared/index.js';
import type { ToolExposureMode, ToolHandlerContext } from './registry.js';
import { getToolSpec, isToolExposed } from './registry.js';

export type ToolCallContext = ToolHandlerContext;

export type ToolCallResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

export function formatToolError(err: unknown): ToolCallResult & { isError: true } {
  const payload = { error: toLinesError(err).toJSON() };
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError: true,
  };
}

export async function handleToolCall(
  name: string,
  args: Record<string, unknown>,
  mode: ToolExposureMode = 'standard',
  ctx: ToolCallContext = {}
): Promise<ToolCallResult> {
  try {
    const spec = getToolSpec(name);
    if (!spec) {
      throw invalidParams(`Unknown tool: ${name}`);
    }
    if (!isToolExposed(spec, mode)) {
      throw invalidParams(`Tool not exposed in ${mode} mode: ${name}`);
    }

    const result = await spec.handler(args, ctx);
    return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  } catch (err) {
    return formatToolError(err);
  }
}
