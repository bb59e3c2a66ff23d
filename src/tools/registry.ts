import { z, ZodError } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import { invalidParams } from '../shared/index.js';
import type { ToolExposureMode } from '../config.js';
import {
  filterBySpecies,
  hyperfineGroups,
  isHyperfineLine,
  isLineOf,
  isSameHyperfineGroup,
  moleculesAmong,
  parseLine,
  removeHyperfine,
  renderLine,
  renderSpecies,
  renderTransition,
} from '../lines/index.js';
import {
  DEFAULT_SYMBOL_TABLES,
  ELECTRONIC_PREFIX,
  SPECIES_ALIASES,
  knownSpecies,
  speciesTemplate,
} from '../lines/symbolTables.js';
import { RenderOptionsSchema, mergeRenderOptions, type RenderOptionsInput } from '../lines/options.js';
import {
  LINES_FILTER_BY_SPECIES,
  LINES_HYPERFINE_GROUPS,
  LINES_INFO,
  LINES_IS_HYPERFINE,
  LINES_IS_LINE_OF,
  LINES_MOLECULES_AMONG,
  LINES_PARSE_LINE,
  LINES_REMOVE_HYPERFINE,
  LINES_RENDER_LINE,
  LINES_RENDER_LINES,
  LINES_RENDER_SPECIES,
  LINES_RENDER_TRANSITION,
  LINES_SAME_HYPERFINE_GROUP,
  SERVER_NAME,
  SERVER_VERSION,
  type LinesToolName,
} from '../constants.js';

export type { ToolExposureMode } from '../config.js';
export type ToolExposure = 'standard' | 'full';

export interface ToolHandlerContext {
  /** Render options applied under the per-call `options` argument. */
  renderDefaults?: RenderOptionsInput;
}

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: LinesToolName;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler: (params: z.output<TSchema>, ctx: ToolHandlerContext) => Promise<unknown>;
}

export function isToolExposed(spec: ToolSpec, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

function parseToolArgs<TSchema extends z.ZodType>(toolName: string, schema: TSchema, args: unknown): z.output<TSchema> {
  try {
    return schema.parse(args);
  } catch (err) {
    if (err instanceof ZodError) {
      throw invalidParams(`Invalid parameters for ${toolName}`, {
        issues: err.issues,
      });
    }
    throw err;
  }
}

// Typed against its own schema, then widened for the registry list.
function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): ToolSpec {
  return {
    ...spec,
    handler: (args, ctx) => spec.handler(parseToolArgs(spec.name, spec.zodSchema, args), ctx),
  };
}

function effectiveOptions(ctx: ToolHandlerContext, options: RenderOptionsInput | undefined): RenderOptionsInput {
  return mergeRenderOptions(ctx.renderDefaults ?? {}, options);
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const Identifier = z.string().min(1).describe('Line identifier, e.g. "h2_v0_j2__v0_j0"');
const IdentifierList = z.array(z.string().min(1)).min(1).max(5000).describe('Line identifiers');
const Options = RenderOptionsSchema.optional().describe('Rendering options; unset fields use the server defaults');

const LinesInfoSchema = z.object({});

const LinesParseLineSchema = z.object({
  identifier: Identifier,
});

const LinesRenderLineSchema = z.object({
  identifier: Identifier,
  options: Options,
});

const LinesRenderLinesSchema = z.object({
  identifiers: IdentifierList,
  options: Options,
});

const LinesRenderSpeciesSchema = z.object({
  species: z.string().min(1).describe('Species or alias, e.g. "h2o", "13co"'),
  options: Options,
});

const LinesRenderTransitionSchema = z.object({
  transition: z.string().min(1).describe('Transition part of an identifier, e.g. "j1_ka1_kc1__j0_ka0_kc0"'),
  options: Options,
});

const LinesIsHyperfineSchema = z.object({
  identifier: Identifier,
});

const LinesSameHyperfineGroupSchema = z.object({
  a: Identifier,
  b: Identifier,
});

const LinesRemoveHyperfineSchema = z.object({
  identifier: Identifier,
});

const LinesHyperfineGroupsSchema = z.object({
  identifiers: IdentifierList,
});

const LinesMoleculesAmongSchema = z.object({
  identifiers: IdentifierList,
});

const LinesFilterBySpeciesSchema = z.object({
  identifiers: IdentifierList,
  species: z.union([z.string().min(1), z.array(z.string().min(1))]).optional()
    .describe('Species to keep (aliases accepted); omit to keep every line'),
});

const LinesIsLineOfSchema = z.object({
  identifier: Identifier,
  species: z.string().min(1).describe('Species or alias'),
});

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: LINES_INFO,
    description: 'List the species, aliases and energy labels the line-name grammar knows, with server version.',
    exposure: 'standard',
    zodSchema: LinesInfoSchema,
    handler: async (_params, ctx) => ({
      server: SERVER_NAME,
      version: SERVER_VERSION,
      species: knownSpecies().map(name => ({ name, latex: speciesTemplate(name) })),
      aliases: SPECIES_ALIASES,
      energy_labels: DEFAULT_SYMBOL_TABLES.energy,
      electronic_states: Object.keys(DEFAULT_SYMBOL_TABLES.electronic).map(state => `${ELECTRONIC_PREFIX}<n>${state}`),
      literal_flags: DEFAULT_SYMBOL_TABLES.literal,
      render_defaults: ctx.renderDefaults ?? {},
    }),
  }),
  defineTool({
    name: LINES_PARSE_LINE,
    description: 'Split a line identifier into canonical species, transition and the token sequences of the upper and lower levels.',
    exposure: 'standard',
    zodSchema: LinesParseLineSchema,
    handler: async (params) => parseLine(params.identifier),
  }),
  defineTool({
    name: LINES_RENDER_LINE,
    description: 'Render a line identifier (e.g. "h2_v0_j2__v0_j0") as a LaTeX label such as "$H_2$ $\\nu=0$ ($J=2$ $\\to$ $J=0$)".',
    exposure: 'standard',
    zodSchema: LinesRenderLineSchema,
    handler: async (params, ctx) => ({
      identifier: params.identifier,
      latex: renderLine(params.identifier, effectiveOptions(ctx, params.options)),
    }),
  }),
  defineTool({
    name: LINES_RENDER_LINES,
    description: 'Render many line identifiers at once. Fails on the first identifier that cannot be rendered.',
    exposure: 'standard',
    zodSchema: LinesRenderLinesSchema,
    handler: async (params, ctx) => {
      const options = effectiveOptions(ctx, params.options);
      return params.identifiers.map(identifier => ({ identifier, latex: renderLine(identifier, options) }));
    },
  }),
  defineTool({
    name: LINES_RENDER_SPECIES,
    description: 'Render a chemical species or alias (e.g. "13co") as LaTeX.',
    exposure: 'standard',
    zodSchema: LinesRenderSpeciesSchema,
    handler: async (params, ctx) => ({
      species: params.species,
      latex: renderSpecies(params.species, effectiveOptions(ctx, params.options)),
    }),
  }),
  defineTool({
    name: LINES_RENDER_TRANSITION,
    description: 'Render the transition part of an identifier (upper__lower) as LaTeX, without the species.',
    exposure: 'standard',
    zodSchema: LinesRenderTransitionSchema,
    handler: async (params, ctx) => ({
      transition: params.transition,
      latex: renderTransition(params.transition, effectiveOptions(ctx, params.options)),
    }),
  }),
  defineTool({
    name: LINES_IS_HYPERFINE,
    description: 'Whether a line resolves hyperfine structure (an f quantum number in either level).',
    exposure: 'standard',
    zodSchema: LinesIsHyperfineSchema,
    handler: async (params) => ({ identifier: params.identifier, hyperfine: isHyperfineLine(params.identifier) }),
  }),
  defineTool({
    name: LINES_SAME_HYPERFINE_GROUP,
    description: 'Whether two lines are hyperfine components of the same transition (same species, same levels apart from f).',
    exposure: 'standard',
    zodSchema: LinesSameHyperfineGroupSchema,
    handler: async (params) => ({ a: params.a, b: params.b, same_group: isSameHyperfineGroup(params.a, params.b) }),
  }),
  defineTool({
    name: LINES_REMOVE_HYPERFINE,
    description: 'Drop the hyperfine f quantum number from both levels of a line identifier.',
    exposure: 'standard',
    zodSchema: LinesRemoveHyperfineSchema,
    handler: async (params) => ({ identifier: params.identifier, collapsed: removeHyperfine(params.identifier) }),
  }),
  defineTool({
    name: LINES_HYPERFINE_GROUPS,
    description: 'Partition line identifiers into hyperfine manifolds, keyed by the collapsed identifier.',
    exposure: 'full',
    zodSchema: LinesHyperfineGroupsSchema,
    handler: async (params) => Object.fromEntries(hyperfineGroups(params.identifiers)),
  }),
  defineTool({
    name: LINES_MOLECULES_AMONG,
    description: 'Distinct canonical species among line identifiers, in first-seen order.',
    exposure: 'standard',
    zodSchema: LinesMoleculesAmongSchema,
    handler: async (params) => moleculesAmong(params.identifiers),
  }),
  defineTool({
    name: LINES_FILTER_BY_SPECIES,
    description: 'Keep only the line identifiers of the given species (aliases accepted), preserving order.',
    exposure: 'standard',
    zodSchema: LinesFilterBySpeciesSchema,
    handler: async (params) => filterBySpecies(params.identifiers, params.species),
  }),
  defineTool({
    name: LINES_IS_LINE_OF,
    description: 'Whether a line identifier belongs to the given species (aliases accepted).',
    exposure: 'standard',
    zodSchema: LinesIsLineOfSchema,
    handler: async (params) => ({
      identifier: params.identifier,
      species: params.species,
      is_line_of: isLineOf(params.identifier, params.species),
    }),
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}
