import { z } from 'zod';

export const DEFAULT_MAX_LINES = 20000;
export const DEFAULT_MAX_DEPTH = 1;
export const DEFAULT_GITINGEST_BIN = 'gitingest';

const PatternListSchema = z.array(z.string().min(1, 'Patterns must not be empty')).default([]);

export const DigestConfigSchema = z.object({
  /** Root directory of the repository to digest */
  root: z.string().min(1, 'A root directory is required'),
  /** Directory receiving all digest files; defaults to `<root>-digest` beside the root */
  digestDir: z.string().min(1).optional(),
  /** Maximum lines allowed in a single digest before splitting */
  maxLines: z.number().int().nonnegative().default(DEFAULT_MAX_LINES),
  /** Maximum directory depth (relative to root) to split recursively */
  maxDepth: z.number().int().nonnegative().default(DEFAULT_MAX_DEPTH),
  excludePatterns: PatternListSchema,
  includePatterns: PatternListSchema,
  /** Maximum file size to process, in bytes */
  maxSize: z.number().int().positive().optional(),
  branch: z.string().min(1).optional(),
  /** Name or path of the ingestion executable */
  gitingestBin: z.string().min(1).default(DEFAULT_GITINGEST_BIN),
  /** Append run events as JSON lines to this file */
  traceFile: z.string().min(1).optional(),
});

export type DigestConfig = z.infer<typeof DigestConfigSchema>;
export type DigestConfigInput = z.input<typeof DigestConfigSchema>;
