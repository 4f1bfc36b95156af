/**
 * Zod schemas for validating tool arguments passed by the MCP client.
 *
 * These check shape and coerce loosely-typed input (numeric strings,
 * comma-separated lists, Y/N flags). Value rules such as key formats and
 * numeric ranges are enforced again by the SQL builder.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import {
  DEFAULT_LIMIT,
  MAX_COMPONENT_FILTERS,
  MAX_DAY_WINDOW,
  MAX_ISSUE_KEYS,
  MAX_LIMIT,
} from './sql/sql-builder.js';

// ─── Building Blocks ─────────────────────────────────────────

/** Blank strings count as "not provided". */
const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

/** A number, or a string of digits. Booleans, arrays and other types are rejected. */
const wholeNumber = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'Expected a whole number')
    .transform(Number),
]);

const limit = wholeNumber
  .pipe(z.number().int().min(1).max(MAX_LIMIT))
  .default(DEFAULT_LIMIT);

const dayWindow = wholeNumber.pipe(z.number().int().min(1).max(MAX_DAY_WINDOW)).optional();

/** An array of strings, or one comma-separated string. */
function stringList(max: number) {
  return z
    .union([
      z.array(z.string()),
      z.string().transform((value) => value.split(',')),
    ])
    .transform((values) => values.map((value) => value.trim()).filter(Boolean))
    .pipe(z.array(z.string()).max(max));
}

/**
 * Optional list filter. A blank string (only spaces and commas) counts as
 * "not provided"; an explicit empty array stays and matches nothing.
 */
function optionalStringList(max: number) {
  return z
    .union([z.string().regex(/^[\s,]*$/).transform(() => undefined), stringList(max)])
    .optional();
}

const flag = z
  .union([
    z.boolean(),
    z
      .string()
      .toLowerCase()
      .pipe(z.enum(['y', 'n', 'true', 'false']))
      .transform((value) => value === 'y' || value === 'true'),
  ])
  .optional();

// ─── Tool Arguments ──────────────────────────────────────────

export const ListIssuesArgsSchema = z.object({
  project: optionalText,
  issue_type: optionalText,
  status: optionalText,
  priority: optionalText,
  search_text: optionalText,
  components: optionalStringList(MAX_COMPONENT_FILTERS),
  version: optionalText,
  created_days: dayWindow,
  updated_days: dayWindow,
  resolved_days: dayWindow,
  timeframe: dayWindow,
  limit,
});

export const IssueDetailsArgsSchema = z.object({
  issue_keys: stringList(MAX_ISSUE_KEYS),
});

export const ProjectSummaryArgsSchema = z.object({});

export const IssueLinksArgsSchema = z.object({
  issue_key: z.string().trim().min(1, 'issue_key is required'),
});

export const SprintIssuesArgsSchema = z.object({
  sprint_name: z.string().trim().min(1, 'sprint_name is required'),
  project: optionalText,
  limit,
});

export const ListComponentsArgsSchema = z.object({
  project: optionalText,
  archived: flag,
  deleted: flag,
  search_text: optionalText,
  limit,
});

export type ListIssuesArgs = z.infer<typeof ListIssuesArgsSchema>;
export type IssueDetailsArgs = z.infer<typeof IssueDetailsArgsSchema>;
export type IssueLinksArgs = z.infer<typeof IssueLinksArgsSchema>;
export type SprintIssuesArgs = z.infer<typeof SprintIssuesArgsSchema>;
export type ListComponentsArgs = z.infer<typeof ListComponentsArgsSchema>;

// ─── Parsing ─────────────────────────────────────────────────

/**
 * Parse tool arguments, turning Zod issues into a single ValidationError
 * that names each offending argument.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.output<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid arguments: ${problems.join('; ')}`);
  }
  return result.data;
}
