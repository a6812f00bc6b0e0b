import { z } from 'zod';

/** Upper bound on traversal depth; also the default ("unbounded"). */
export const MAX_SCAN_DEPTH = 255;

export const DEFAULT_MARKERS = [
  '.git',
  '.hg',
  '.svn',
  'Cargo.toml',
  'package.json',
  'go.mod',
  'pyproject.toml',
];

export const DEFAULT_IGNORE = [
  'node_modules',
  'venv',
  'bin',
  'target',
  'debug',
  'src',
  'test',
  'tests',
  'lib',
  'docs',
  'pkg',
];

export const TraversalModeSchema = z.enum(['directory-marker', 'file-listing']);
export type TraversalMode = z.infer<typeof TraversalModeSchema>;

const DepthSchema = z.number().int().min(0).max(MAX_SCAN_DEPTH);

const NameListSchema = z.array(z.string().min(1, 'must not be empty'));

export const RootMarkersSchema = z.object({
  exact: NameListSchema.default(DEFAULT_MARKERS),
  pattern: NameListSchema.default([]),
  traverseHidden: z.boolean().default(false),
  chainRootMarkers: z.boolean().default(true),
});

export const RootIgnoreSchema = z.object({
  exact: NameListSchema.default(DEFAULT_IGNORE),
  pattern: NameListSchema.default([]),
  chainRootIgnore: z.boolean().default(true),
});

export const IncludeEntrySchema = z.object({
  paths: z.array(z.string().min(1)).min(1, 'at least one path is required'),
  mode: TraversalModeSchema.default('directory-marker'),
  markers: z
    .object({
      exact: NameListSchema.default([]),
      pattern: NameListSchema.default([]),
      chainRootMarkers: z.boolean().optional(),
    })
    .default({}),
  ignore: z
    .object({
      exact: NameListSchema.default([]),
      pattern: NameListSchema.default([]),
      chainRootIgnore: z.boolean().optional(),
    })
    .default({}),
  traverseHidden: z.boolean().optional(),
  includeIntermediatePaths: z.boolean().optional(),
  yieldOnMarker: z.boolean().optional(),
  depth: DepthSchema.optional(),
});

/**
 * A predefined tmux session: its windows open in the listed directories.
 */
export const SessionSchema = z.object({
  name: z.string().min(1),
  windows: z.array(z.string().min(1)).default([]),
});

export const ConfigSchema = z.object({
  markers: RootMarkersSchema.default({}),
  ignore: RootIgnoreSchema.default({}),
  yieldOnMarker: z.boolean().default(true),
  includeIntermediatePaths: z.boolean().default(true),
  depth: DepthSchema.default(MAX_SCAN_DEPTH),
  include: z.array(IncludeEntrySchema).default([{ paths: ['$HOME'] }]),
  sessions: z.array(SessionSchema).default([]),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type IncludeEntry = z.infer<typeof IncludeEntrySchema>;
export type SessionDefinition = z.infer<typeof SessionSchema>;
