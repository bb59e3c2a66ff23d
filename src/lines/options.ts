import { z } from 'zod';
import { invalidParams } from '../shared/index.js';

export const RenderOptionsSchema = z.object({
  mathMode: z.boolean().optional().describe('Wrap every fragment in $…$ (default: true)'),
  suppressedLabels: z.array(z.string().min(1)).optional()
    .describe('Energy keys to drop from both levels, e.g. ["v", "f"]'),
  suppressElectronic: z.boolean().optional().describe('Drop electronic states such as 3d (default: false)'),
  suppressLiterals: z.boolean().optional().describe('Drop flag tokens such as pp/pm (default: false)'),
  rotationalOnly: z.boolean().optional().describe('Keep only the rotational J token (default: false)'),
}).strict();

export type RenderOptionsInput = z.infer<typeof RenderOptionsSchema>;

export interface RenderOptions {
  readonly mathMode: boolean;
  readonly suppressedLabels: ReadonlySet<string>;
  readonly suppressElectronic: boolean;
  readonly suppressLiterals: boolean;
  readonly rotationalOnly: boolean;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = Object.freeze({
  mathMode: true,
  suppressedLabels: new Set<string>(),
  suppressElectronic: false,
  suppressLiterals: false,
  rotationalOnly: false,
});

/** Validate caller options and fill the unset fields from the defaults. */
export function resolveRenderOptions(input: RenderOptionsInput = {}): RenderOptions {
  const parsed = RenderOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw invalidParams('Invalid render options', { issues: parsed.error.issues });
  }
  const options = parsed.data;
  return Object.freeze({
    mathMode: options.mathMode ?? DEFAULT_RENDER_OPTIONS.mathMode,
    suppressedLabels: options.suppressedLabels !== undefined
      ? new Set(options.suppressedLabels.map(key => key.trim().toLowerCase()))
      : DEFAULT_RENDER_OPTIONS.suppressedLabels,
    suppressElectronic: options.suppressElectronic ?? DEFAULT_RENDER_OPTIONS.suppressElectronic,
    suppressLiterals: options.suppressLiterals ?? DEFAULT_RENDER_OPTIONS.suppressLiterals,
    rotationalOnly: options.rotationalOnly ?? DEFAULT_RENDER_OPTIONS.rotationalOnly,
  });
}

/** Field-by-field overlay; `undefined` in `overrides` keeps the base value. */
export function mergeRenderOptions(base: RenderOptionsInput, overrides: RenderOptionsInput = {}): RenderOptionsInput {
  const merged: RenderOptionsInput = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return merged;
}
