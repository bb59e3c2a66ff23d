import { z } from 'zod';
import { invalidParams } from './shared/index.js';
import type { RenderOptionsInput } from './lines/options.js';

export type ToolExposureMode = 'standard' | 'full';

export interface ServerConfig {
  toolMode: ToolExposureMode;
  renderDefaults: RenderOptionsInput;
}

const FlagSchema = z.enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
  .transform(value => ['1', 'true', 'yes', 'on'].includes(value));

const EnvSchema = z.object({
  PDR_LINES_TOOL_MODE: z.enum(['standard', 'full']).optional(),
  PDR_LINES_MATH_MODE: FlagSchema.optional(),
  PDR_LINES_SUPPRESS: z.string().optional(),
  PDR_LINES_SUPPRESS_ELECTRONIC: FlagSchema.optional(),
  PDR_LINES_SUPPRESS_LITERALS: FlagSchema.optional(),
  PDR_LINES_ROTATIONAL_ONLY: FlagSchema.optional(),
});

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim().toLowerCase();
    out[key] = value === undefined || value.length === 0 ? undefined : value;
  }
  return out;
}

/** Read server settings from `PDR_LINES_*` environment variables. */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    throw invalidParams('Invalid PDR_LINES_* environment configuration', { issues: parsed.error.issues });
  }
  const vars = parsed.data;

  const renderDefaults: RenderOptionsInput = {};
  if (vars.PDR_LINES_MATH_MODE !== undefined) renderDefaults.mathMode = vars.PDR_LINES_MATH_MODE;
  if (vars.PDR_LINES_SUPPRESS !== undefined) {
    renderDefaults.suppressedLabels = vars.PDR_LINES_SUPPRESS.split(',').map(key => key.trim()).filter(key => key.length > 0);
  }
  if (vars.PDR_LINES_SUPPRESS_ELECTRONIC !== undefined) renderDefaults.suppressElectronic = vars.PDR_LINES_SUPPRESS_ELECTRONIC;
  if (vars.PDR_LINES_SUPPRESS_LITERALS !== undefined) renderDefaults.suppressLiterals = vars.PDR_LINES_SUPPRESS_LITERALS;
  if (vars.PDR_LINES_ROTATIONAL_ONLY !== undefined) renderDefaults.rotationalOnly = vars.PDR_LINES_ROTATIONAL_ONLY;

  return {
    toolMode: vars.PDR_LINES_TOOL_MODE ?? 'standard',
    renderDefaults,
  };
}
