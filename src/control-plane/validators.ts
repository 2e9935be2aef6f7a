import { z } from 'zod';
import { HistoryView } from '../history/virtual-repository.js';

/**
 * Options shared by every command that opens a repository.
 */
const repositoryOptionsSchema = z.object({
  repo: z.string().min(1).default('.'),
  master: z.array(z.string().min(1)).default([]),
  json: z.boolean().default(false),
});

/**
 * Refresh command options schema.
 */
export const refreshCommandOptionsSchema = repositoryOptionsSchema.extend({
  force: z.boolean().default(false),
});

export type RefreshCommandOptions = z.infer<typeof refreshCommandOptionsSchema>;

/**
 * History command options schema.
 */
export const historyCommandOptionsSchema = repositoryOptionsSchema.extend({
  view: z.nativeEnum(HistoryView).default(HistoryView.CHANGED),
  category: z.string().min(1).optional(),
  package: z.string().min(1).optional(),
  atom: z.string().min(1).optional(),
  sort: z.enum(['version', 'commit']).default('version'),
});

export type HistoryCommandOptions = z.infer<typeof historyCommandOptionsSchema>;

/**
 * Commits command options schema.
 */
export const commitsCommandOptionsSchema = repositoryOptionsSchema.extend({
  /** Show package changes of the local commits in this view instead of the commits */
  view: z.nativeEnum(HistoryView).optional(),
});

export type CommitsCommandOptions = z.infer<typeof commitsCommandOptionsSchema>;

/**
 * Scope command options schema.
 */
export const scopeCommandOptionsSchema = repositoryOptionsSchema.extend({
  ref: z.string().min(1).optional(),
  stash: z.boolean().default(false),
});

export type ScopeCommandOptions = z.infer<typeof scopeCommandOptionsSchema>;

/**
 * Flatten zod issues for display.
 */
export function validationIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}
