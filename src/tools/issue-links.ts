/**
 * get_jira_issue_links: every link touching one issue, in both directions.
 */

import {
  buildIssueIdLookupStatement,
  buildLinksStatement,
  normalizeIssueKey,
} from '../sql/sql-builder.js';
import { groupLinks, idKey, rowsToObjects } from '../assembler/result-assembler.js';
import { IssueNotFoundError } from '../errors.js';
import { IssueLinksArgsSchema, type IssueLinksArgs } from '../validators.js';
import { defineTool, type ToolContext } from './types.js';
import type { Cell } from '../warehouse/types.js';
import type { JiraIssueLink } from '../types/jira.js';

export interface IssueLinksResult {
  issue_key: string;
  issue_id: Cell;
  links: JiraIssueLink[];
  total_links: number;
}

export async function getJiraIssueLinks(
  args: IssueLinksArgs,
  ctx: ToolContext
): Promise<IssueLinksResult> {
  const issueKey = normalizeIssueKey(args.issue_key);
  const lookup = await ctx.warehouse.execute(buildIssueIdLookupStatement(issueKey));
  const issueId = rowsToObjects(lookup)[0]?.['ID'];
  if (typeof issueId !== 'number') {
    throw new IssueNotFoundError(issueKey);
  }

  const links = await ctx.warehouse.execute(buildLinksStatement([issueId]));
  const grouped = groupLinks(links, [issueId]).get(idKey(issueId)) ?? [];

  return {
    issue_key: issueKey,
    issue_id: issueId,
    links: grouped,
    total_links: grouped.length,
  };
}

export const issueLinksTool = defineTool({
  name: 'get_jira_issue_links',
  description:
    'Get all links for a JIRA issue (blocks, clones, relates to, ...), with the direction seen from that issue and the linked issue key and summary.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      issue_key: {
        type: 'string' as const,
        description: 'Issue key (e.g., "SMQE-1280")',
      },
    },
    required: ['issue_key'],
  },
  schema: IssueLinksArgsSchema,
  handler: getJiraIssueLinks,
});
