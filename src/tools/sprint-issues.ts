/**
 * get_jira_issues_by_sprint: issues in a sprint looked up by name.
 *
 * Sprint membership lives in a custom field whose values are sprint ids;
 * the field id is configurable. An unknown sprint name is not an error.
 */

import { buildIssueListStatement, buildSprintLookupStatement } from '../sql/sql-builder.js';
import { assembleIssueSummaries, toSprint } from '../assembler/result-assembler.js';
import { SprintIssuesArgsSchema, type SprintIssuesArgs } from '../validators.js';
import { fetchSummaryChildren, issueIdsOf } from './enrichment.js';
import { defineTool, type ToolContext } from './types.js';
import type { Cell } from '../warehouse/types.js';
import type { JiraIssueSummary } from '../types/jira.js';

export interface SprintIssuesResult {
  sprint_name: string;
  sprint_id: Cell;
  start_date: Cell;
  end_date: Cell;
  issues: JiraIssueSummary[];
  total_returned: number;
}

export async function getJiraIssuesBySprint(
  args: SprintIssuesArgs,
  ctx: ToolContext
): Promise<SprintIssuesResult> {
  const sprint = toSprint(await ctx.warehouse.execute(buildSprintLookupStatement(args.sprint_name)));
  if (!sprint || sprint.id === null) {
    return {
      sprint_name: args.sprint_name,
      sprint_id: null,
      start_date: null,
      end_date: null,
      issues: [],
      total_returned: 0,
    };
  }

  const issues = await ctx.warehouse.execute(
    buildIssueListStatement({
      project: args.project,
      sprint: { fieldId: ctx.settings.sprintCustomFieldId, sprintId: String(sprint.id) },
      limit: args.limit,
    })
  );
  const children = await fetchSummaryChildren(ctx.warehouse, issueIdsOf(issues));
  const records = assembleIssueSummaries(issues, children);

  return {
    sprint_name: args.sprint_name,
    sprint_id: sprint.id,
    start_date: sprint.start_date,
    end_date: sprint.end_date,
    issues: records,
    total_returned: records.length,
  };
}

export const sprintIssuesTool = defineTool({
  name: 'get_jira_issues_by_sprint',
  description:
    'List the JIRA issues in a sprint, found by exact sprint name. If several sprints share the name, the most recently created one is used. Returns sprint_id null when no sprint matches.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      sprint_name: {
        type: 'string' as const,
        description: 'Exact sprint name (e.g., "Sprint 42")',
      },
      project: {
        type: 'string' as const,
        description: 'Restrict to one project key (e.g., "SMQE")',
      },
      limit: {
        type: 'number' as const,
        description: 'Maximum issues to return (1-1000, default 50)',
      },
    },
    required: ['sprint_name'],
  },
  schema: SprintIssuesArgsSchema,
  handler: getJiraIssuesBySprint,
});
