/**
 * get_jira_project_summary: issue counts per project, status and priority.
 */

import { buildProjectSummaryStatement } from '../sql/sql-builder.js';
import { summarizeProjects } from '../assembler/result-assembler.js';
import { ProjectSummaryArgsSchema } from '../validators.js';
import { defineTool, type ToolContext } from './types.js';
import type { ProjectSummary } from '../types/jira.js';

export async function getJiraProjectSummary(ctx: ToolContext): Promise<ProjectSummary> {
  const result = await ctx.warehouse.execute(buildProjectSummaryStatement());
  return summarizeProjects(result);
}

export const projectSummaryTool = defineTool({
  name: 'get_jira_project_summary',
  description:
    'Summarize all JIRA projects: total issues per project with breakdowns by status id and priority id.',
  inputSchema: {
    type: 'object' as const,
    properties: {},
  },
  schema: ProjectSummaryArgsSchema,
  handler: (_args, ctx) => getJiraProjectSummary(ctx),
});
