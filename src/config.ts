import { z } from 'zod';
import { LOG_LEVELS } from './log.js';
import { DANGLING_POLICIES, DELETE_POLICIES } from './model.js';
import { DEFAULT_MAX_HISTORY } from './history.js';

export const EditorConfigSchema = z.object({
  maxHistory: z.number().int().positive().default(DEFAULT_MAX_HISTORY),
  deletePolicy: z.enum(DELETE_POLICIES).default('detach'),
  danglingReferences: z.enum(DANGLING_POLICIES).default('retain'),
  compress: z.boolean().default(false),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
});

export type EditorConfig = z.infer<typeof EditorConfigSchema>;
export type EditorConfigInput = z.input<typeof EditorConfigSchema>;

export function resolveConfig(input: EditorConfigInput = {}): EditorConfig {
  return EditorConfigSchema.parse(input);
}

const unsetIfBlank = (value: unknown): unknown => (value === '' ? undefined : value);

const EnvSchema = z.object({
  MXDOC_MAX_HISTORY: z.preprocess(unsetIfBlank, z.coerce.number().int().positive().optional()),
  MXDOC_DELETE_POLICY: z.preprocess(unsetIfBlank, z.enum(DELETE_POLICIES).optional()),
  MXDOC_DANGLING_REFERENCES: z.preprocess(unsetIfBlank, z.enum(DANGLING_POLICIES).optional()),
  MXDOC_COMPRESS: z.preprocess(
    unsetIfBlank,
    z
      .enum(['1', '0', 'true', 'false'])
      .transform((v) => v === '1' || v === 'true')
      .optional(),
  ),
  MXDOC_LOG_LEVEL: z.preprocess(unsetIfBlank, z.enum(LOG_LEVELS).optional()),
});

/** Read editor settings from `MXDOC_*` environment variables */
export function loadConfig(env: Record<string, string | undefined> = process.env): EditorConfig {
  const parsed = EnvSchema.parse(env);
  return resolveConfig({
    maxHistory: parsed.MXDOC_MAX_HISTORY,
    deletePolicy: parsed.MXDOC_DELETE_POLICY,
    danglingReferences: parsed.MXDOC_DANGLING_REFERENCES,
    compress: parsed.MXDOC_COMPRESS,
    logLevel: parsed.MXDOC_LOG_LEVEL,
  });
}
