/**
 * list_jira_issues: filtered issue search in summary form.
 */

import { buildIssueListStatement } from '../sql/sql-builder.js';
import { assembleIssueSummaries } from '../assembler/result-assembler.js';
import { ListIssuesArgsSchema, type ListIssuesArgs } from '../validators.js';
import { fetchSummaryChildren, issueIdsOf } from './enrichment.js';
import { defineTool, type ToolContext } from './types.js';
import type { JiraIssueSummary } from '../types/jira.js';

export interface ListIssuesResult {
  issues: JiraIssueSummary[];
  total_returned: number;
  filters_applied: ListIssuesArgs;
}

export async function listJiraIssues(
  args: ListIssuesArgs,
  ctx: ToolContext
): Promise<ListIssuesResult> {
  const statement = buildIssueListStatement({
    project: args.project,
    issueType: args.issue_type,
    status: args.status,
    priority: args.priority,
    searchText: args.search_text,
    components: args.components,
    version: args.version,
    createdDays: args.created_days,
    updatedDays: args.updated_days,
    resolvedDays: args.resolved_days,
    timeframe: args.timeframe,
    limit: args.limit,
  });

  const issues = await ctx.warehouse.execute(statement);
  const children = await fetchSummaryChildren(ctx.warehouse, issueIdsOf(issues));
  const records = assembleIssueSummaries(issues, children);

  return {
    issues: records,
    total_returned: records.length,
    filters_applied: args,
  };
}

export const listIssuesTool = defineTool({
  name: 'list_jira_issues',
  description:
    'List JIRA issues with optional filters, newest first. Returns summary records with labels, fix/affected versions and components; descriptions are truncated to 500 characters. Use get_jira_issue_details for comments, links and status history.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      project: {
        type: 'string' as const,
        description: 'Project key (e.g., "SMQE")',
      },
      issue_type: {
        type: 'string' as const,
        description: 'Issue type id (numeric string)',
      },
      status: {
        type: 'string' as const,
        description: 'Issue status id (numeric string)',
      },
      priority: {
        type: 'string' as const,
        description: 'Priority id (numeric string)',
      },
      search_text: {
        type: 'string' as const,
        description: 'Case-insensitive text to find in summary or description',
      },
      components: {
        type: 'array' as const,
        items: { type: 'string' as const },
        description: 'Component names; matches issues in any of them',
      },
      version: {
        type: 'string' as const,
        description: 'Fix version name',
      },
      created_days: {
        type: 'number' as const,
        description: 'Only issues created within the last N days',
      },
      updated_days: {
        type: 'number' as const,
        description: 'Only issues updated within the last N days',
      },
      resolved_days: {
        type: 'number' as const,
        description: 'Only issues resolved within the last N days',
      },
      timeframe: {
        type: 'number' as const,
        description:
          'Only issues created, updated or resolved within the last N days (combined with the other windows using AND)',
      },
      limit: {
        type: 'number' as const,
        description: 'Maximum issues to return (1-1000, default 50)',
      },
    },
  },
  schema: ListIssuesArgsSchema,
  handler: listJiraIssues,
});
