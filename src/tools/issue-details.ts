/**
 * get_jira_issue_details: full records for a list of issue keys.
 *
 * Keys are normalized, split into batches and fetched with bounded
 * concurrency. A batch that keeps failing costs only its own keys, which
 * are reported in not_found and failed_batches.
 */

import { buildIssueDetailStatement, normalizeIssueKeys } from '../sql/sql-builder.js';
import { assembleIssueDetails, partitionByKey } from '../assembler/result-assembler.js';
import { runBatches } from '../orchestrator/batch-runner.js';
import { toErrorPayload, type ErrorPayload } from '../errors.js';
import { IssueDetailsArgsSchema, type IssueDetailsArgs } from '../validators.js';
import { fetchDetailChildren, issueIdsOf } from './enrichment.js';
import { defineTool, type ToolContext } from './types.js';
import type { QueryExecutor } from '../warehouse/warehouse-client.js';
import type { JiraIssueDetail } from '../types/jira.js';

export interface FailedBatch {
  batch_index: number;
  issue_keys: string[];
  error: ErrorPayload['error'];
}

export interface IssueDetailsResult {
  found_issues: Record<string, JiraIssueDetail>;
  not_found: string[];
  total_found: number;
  total_requested: number;
  failed_batches?: FailedBatch[];
}

async function fetchIssueBatch(
  warehouse: QueryExecutor,
  issueKeys: string[]
): Promise<JiraIssueDetail[]> {
  const issues = await warehouse.execute(buildIssueDetailStatement(issueKeys));
  const children = await fetchDetailChildren(warehouse, issueIdsOf(issues));
  return assembleIssueDetails(issues, children);
}

export async function getJiraIssueDetails(
  args: IssueDetailsArgs,
  ctx: ToolContext
): Promise<IssueDetailsResult> {
  const keys = normalizeIssueKeys(args.issue_keys);
  if (keys.length === 0) {
    return { found_issues: {}, not_found: [], total_found: 0, total_requested: 0 };
  }

  const outcome = await runBatches(
    keys,
    (batch) => fetchIssueBatch(ctx.warehouse, batch),
    ctx.settings.batch
  );

  // Nothing to show: surface the first failure as the tool error
  const firstFailure = outcome.failed[0];
  if (outcome.succeeded.length === 0 && firstFailure) {
    throw firstFailure.error instanceof Error
      ? firstFailure.error
      : new Error(String(firstFailure.error));
  }

  const records = outcome.succeeded.flatMap((batch) => batch.value);
  const { found_issues, not_found } = partitionByKey(keys, records);

  const result: IssueDetailsResult = {
    found_issues,
    not_found,
    total_found: Object.keys(found_issues).length,
    total_requested: keys.length,
  };
  if (outcome.failed.length > 0) {
    result.failed_batches = outcome.failed.map((failure) => ({
      batch_index: failure.index,
      issue_keys: failure.items,
      error: toErrorPayload(failure.error).error,
    }));
  }
  return result;
}

export const issueDetailsTool = defineTool({
  name: 'get_jira_issue_details',
  description:
    'Get full details for one or more JIRA issues by key, including labels, comments, links, fix/affected versions, components and status history. Keys that do not exist are listed in not_found.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      issue_keys: {
        type: 'array' as const,
        items: { type: 'string' as const },
        description: 'Issue keys (e.g., ["SMQE-1280", "SMQE-1281"]), up to 500',
      },
    },
    required: ['issue_keys'],
  },
  schema: IssueDetailsArgsSchema,
  handler: getJiraIssueDetails,
});
