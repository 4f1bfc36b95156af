/**
 * Child-row fetches shared by the issue tools. The queries for one set of
 * issues run concurrently; an empty id list costs no network call.
 */

import {
  buildCommentsStatement,
  buildIssueComponentsStatement,
  buildLabelsStatement,
  buildLinksStatement,
  buildStatusChangesStatement,
  buildVersionsStatement,
} from '../sql/sql-builder.js';
import { rowsToObjects, type DetailRowSets, type SummaryRowSets } from '../assembler/result-assembler.js';
import type { QueryExecutor } from '../warehouse/warehouse-client.js';
import type { QueryResult } from '../warehouse/types.js';

const EMPTY_RESULT: QueryResult = { columns: [], rows: [] };

/** Numeric ids from the ID column of an issue result. */
export function issueIdsOf(issues: QueryResult): number[] {
  return rowsToObjects(issues)
    .map((row) => row['ID'])
    .filter((id): id is number => typeof id === 'number');
}

export async function fetchSummaryChildren(
  warehouse: QueryExecutor,
  issueIds: readonly number[]
): Promise<SummaryRowSets> {
  if (issueIds.length === 0) {
    return { labels: EMPTY_RESULT, versions: EMPTY_RESULT, components: EMPTY_RESULT };
  }
  const [labels, versions, components] = await Promise.all([
    warehouse.execute(buildLabelsStatement(issueIds)),
    warehouse.execute(buildVersionsStatement(issueIds)),
    warehouse.execute(buildIssueComponentsStatement(issueIds)),
  ]);
  return { labels, versions, components };
}

export async function fetchDetailChildren(
  warehouse: QueryExecutor,
  issueIds: readonly number[]
): Promise<DetailRowSets> {
  if (issueIds.length === 0) {
    return {
      labels: EMPTY_RESULT,
      versions: EMPTY_RESULT,
      components: EMPTY_RESULT,
      comments: EMPTY_RESULT,
      links: EMPTY_RESULT,
      statusChanges: EMPTY_RESULT,
    };
  }
  const [summary, comments, links, statusChanges] = await Promise.all([
    fetchSummaryChildren(warehouse, issueIds),
    warehouse.execute(buildCommentsStatement(issueIds)),
    warehouse.execute(buildLinksStatement(issueIds)),
    warehouse.execute(buildStatusChangesStatement(issueIds)),
  ]);
  return { ...summary, comments, links, statusChanges };
}
