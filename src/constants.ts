export const SERVER_NAME = 'pdr-lines' as const;
export const SERVER_VERSION = '0.1.0' as const;

export const LINES_INFO = 'lines_info' as const;
export const LINES_PARSE_LINE = 'lines_parse_line' as const;
export const LINES_RENDER_LINE = 'lines_render_line' as const;
export const LINES_RENDER_LINES = 'lines_render_lines' as const;
export const LINES_RENDER_SPECIES = 'lines_render_species' as const;
export const LINES_RENDER_TRANSITION = 'lines_render_transition' as const;
export const LINES_IS_HYPERFINE = 'lines_is_hyperfine' as const;
export const LINES_SAME_HYPERFINE_GROUP = 'lines_same_hyperfine_group' as const;
export const LINES_REMOVE_HYPERFINE = 'lines_remove_hyperfine' as const;
export const LINES_HYPERFINE_GROUPS = 'lines_hyperfine_groups' as const;
export const LINES_MOLECULES_AMONG = 'lines_molecules_among' as const;
export const LINES_FILTER_BY_SPECIES = 'lines_filter_by_species' as const;
export const LINES_IS_LINE_OF = 'lines_is_line_of' as const;

export type LinesToolName =
  | typeof LINES_INFO
  | typeof LINES_PARSE_LINE
  | typeof LINES_RENDER_LINE
  | typeof LINES_RENDER_LINES
  | typeof LINES_RENDER_SPECIES
  | typeof LINES_RENDER_TRANSITION
  | typeof LINES_IS_HYPERFINE
  | typeof LINES_SAME_HYPERFINE_GROUP
  | typeof LINES_REMOVE_HYPERFINE
  | typeof LINES_HYPERFINE_GROUPS
  | typeof LINES_MOLECULES_AMONG
  | typeof LINES_FILTER_BY_SPECIES
  | typeof LINES_IS_LINE_OF;
