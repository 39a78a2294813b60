import * as z from 'zod';
import type { ZodError } from 'zod';

export const phaseSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
});

export const autotoolsSchema = z.object({
  with: z.array(z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'feature names are letters, digits, - and _')).default([]),
  configureArgs: z.array(z.string()).default([]),
  searchPaths: z.boolean().default(true),
});

export const recipeSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  autotools: autotoolsSchema.optional(),
  phases: z.array(phaseSchema).min(1).optional(),
}).refine(
  r => (r.autotools === undefined) !== (r.phases === undefined),
  { message: 'exactly one of "autotools" or "phases" is required' },
);

export type Recipe = z.infer<typeof recipeSchema>;

/** Flatten zod issues into `path: message` lines. */
export function formatIssues(error: ZodError): string[] {
  return error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
}
