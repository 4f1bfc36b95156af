/**
 * Result Assembler
 *
 * Shapes decoded warehouse rows into the nested records the tools return.
 * All joins between issues and their child rows happen here, in memory,
 * keyed by issue id. Every function builds new objects; inputs are never
 * mutated.
 */

import type { Cell, QueryResult } from '../warehouse/types.js';
import type {
  JiraComment,
  JiraComponent,
  JiraIssueDetail,
  JiraIssueLink,
  JiraIssueSummary,
  JiraSprint,
  JiraStatusChange,
  ProjectSummary,
} from '../types/jira.js';
import { ASSOCIATION } from '../sql/tables.js';

export type RowObject = Record<string, Cell>;

// ─── Rows ────────────────────────────────────────────────────

/** Pair each row with the result's column names. */
export function rowsToObjects(result: QueryResult): RowObject[] {
  return result.rows.map((row) => {
    const record: RowObject = {};
    result.columns.forEach((column, index) => {
      record[column] = row[index] ?? null;
    });
    return record;
  });
}

function cell(row: RowObject, column: string): Cell {
  return row[column] ?? null;
}

/** Ids arrive as numbers or digit strings depending on the column type. */
export function idKey(value: Cell): string {
  return value === null ? '' : String(value);
}

function text(value: Cell): string {
  return value === null ? '' : String(value);
}

function groupRows<T>(
  result: QueryResult,
  idColumn: string,
  map: (row: RowObject) => T | null
): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rowsToObjects(result)) {
    const value = map(row);
    if (value === null) continue;
    const key = idKey(cell(row, idColumn));
    const group = groups.get(key);
    if (group) {
      group.push(value);
    } else {
      groups.set(key, [value]);
    }
  }
  return groups;
}

// ─── Child Collections ───────────────────────────────────────

export function groupLabels(result: QueryResult): Map<string, string[]> {
  return groupRows(result, 'ISSUE', (row) => {
    const label = cell(row, 'LABEL');
    return label === null ? null : String(label);
  });
}

export function groupComments(result: QueryResult): Map<string, JiraComment[]> {
  return groupRows(result, 'ISSUEID', (row) => ({
    id: cell(row, 'ID'),
    role_level: cell(row, 'ROLELEVEL'),
    body: cell(row, 'BODY'),
    created: cell(row, 'CREATED'),
    updated: cell(row, 'UPDATED'),
  }));
}

export interface VersionGroups {
  fix: Map<string, string[]>;
  affected: Map<string, string[]>;
}

export function groupVersions(result: QueryResult): VersionGroups {
  const versionName = (association: string) => (row: RowObject) => {
    const name = cell(row, 'VNAME');
    return cell(row, 'ASSOCIATION_TYPE') === association && name !== null ? String(name) : null;
  };
  return {
    fix: groupRows(result, 'ISSUE', versionName(ASSOCIATION.fixVersion)),
    affected: groupRows(result, 'ISSUE', versionName(ASSOCIATION.affectedVersion)),
  };
}

export function groupComponents(result: QueryResult): Map<string, string[]> {
  return groupRows(result, 'ISSUE', (row) => {
    const name = cell(row, 'CNAME');
    return name === null ? null : String(name);
  });
}

export function groupStatusChanges(result: QueryResult): Map<string, JiraStatusChange[]> {
  return groupRows(result, 'ISSUEID', (row) => {
    const from = cell(row, 'FROM_STATUS');
    const to = cell(row, 'TO_STATUS');
    return {
      from_status: from,
      to_status: to,
      status_transition: `${from ?? 'Unknown'} → ${to ?? 'Unknown'}`,
      changed_at: cell(row, 'CHANGE_TIMESTAMP'),
    };
  });
}

/**
 * Attach each link to the requested issues it touches: `outward` on its
 * source, `inward` on its destination. A self-link lands twice.
 */
export function groupLinks(
  result: QueryResult,
  issueIds: readonly Cell[]
): Map<string, JiraIssueLink[]> {
  const requested = new Set(issueIds.map(idKey));
  const groups = new Map<string, JiraIssueLink[]>();
  const push = (key: string, link: JiraIssueLink): void => {
    groups.set(key, [...(groups.get(key) ?? []), link]);
  };

  for (const row of rowsToObjects(result)) {
    const source = idKey(cell(row, 'SOURCE'));
    const destination = idKey(cell(row, 'DESTINATION'));
    const shared = {
      link_id: cell(row, 'LINK_ID'),
      link_type: cell(row, 'LINKNAME'),
      sequence: cell(row, 'SEQUENCE'),
    };

    if (requested.has(source)) {
      push(source, {
        ...shared,
        relationship: 'outward',
        relationship_description: cell(row, 'OUTWARD'),
        related_issue_id: cell(row, 'DESTINATION'),
        related_issue_key: cell(row, 'DESTINATION_KEY'),
        related_issue_summary: cell(row, 'DESTINATION_SUMMARY'),
      });
    }
    if (requested.has(destination)) {
      push(destination, {
        ...shared,
        relationship: 'inward',
        relationship_description: cell(row, 'INWARD'),
        related_issue_id: cell(row, 'SOURCE'),
        related_issue_key: cell(row, 'SOURCE_KEY'),
        related_issue_summary: cell(row, 'SOURCE_SUMMARY'),
      });
    }
  }
  return groups;
}

// ─── Issue Records ───────────────────────────────────────────

export interface SummaryRowSets {
  labels: QueryResult;
  versions: QueryResult;
  components: QueryResult;
}

export interface DetailRowSets extends SummaryRowSets {
  comments: QueryResult;
  links: QueryResult;
  statusChanges: QueryResult;
}

function summaryFields(row: RowObject): Omit<
  JiraIssueSummary,
  'labels' | 'versions' | 'affected_versions' | 'components'
> {
  return {
    id: cell(row, 'ID'),
    key: cell(row, 'ISSUE_KEY'),
    project: cell(row, 'PROJECT'),
    issue_number: cell(row, 'ISSUENUM'),
    issue_type: cell(row, 'ISSUETYPE'),
    summary: cell(row, 'SUMMARY'),
    description: text(cell(row, 'DESCRIPTION')),
    priority: cell(row, 'PRIORITY'),
    status: cell(row, 'ISSUESTATUS'),
    resolution: cell(row, 'RESOLUTION'),
    created: cell(row, 'CREATED'),
    updated: cell(row, 'UPDATED'),
    due_date: cell(row, 'DUEDATE'),
    resolution_date: cell(row, 'RESOLUTIONDATE'),
    votes: cell(row, 'VOTES'),
    watches: cell(row, 'WATCHES'),
  };
}

interface SummaryGroups {
  labels: Map<string, string[]>;
  versions: VersionGroups;
  components: Map<string, string[]>;
}

function summaryGroups(children: SummaryRowSets): SummaryGroups {
  return {
    labels: groupLabels(children.labels),
    versions: groupVersions(children.versions),
    components: groupComponents(children.components),
  };
}

function toIssueSummary(row: RowObject, groups: SummaryGroups): JiraIssueSummary {
  const id = idKey(cell(row, 'ID'));
  return {
    ...summaryFields(row),
    labels: groups.labels.get(id) ?? [],
    versions: groups.versions.fix.get(id) ?? [],
    affected_versions: groups.versions.affected.get(id) ?? [],
    components: groups.components.get(id) ?? [],
  };
}

/** One summary record per issue row, children defaulting to []. */
export function assembleIssueSummaries(
  issues: QueryResult,
  children: SummaryRowSets
): JiraIssueSummary[] {
  const groups = summaryGroups(children);
  return rowsToObjects(issues).map((row) => toIssueSummary(row, groups));
}

/** One full record per issue row, every child collection present. */
export function assembleIssueDetails(
  issues: QueryResult,
  children: DetailRowSets
): JiraIssueDetail[] {
  const rows = rowsToObjects(issues);
  const groups = summaryGroups(children);
  const comments = groupComments(children.comments);
  const statusChanges = groupStatusChanges(children.statusChanges);
  const links = groupLinks(
    children.links,
    rows.map((row) => cell(row, 'ID'))
  );

  return rows.map((row) => {
    const id = idKey(cell(row, 'ID'));
    return {
      ...toIssueSummary(row, groups),
      environment: cell(row, 'ENVIRONMENT'),
      time_original_estimate: cell(row, 'TIMEORIGINALESTIMATE'),
      time_estimate: cell(row, 'TIMEESTIMATE'),
      time_spent: cell(row, 'TIMESPENT'),
      workflow_id: cell(row, 'WORKFLOW_ID'),
      security: cell(row, 'SECURITY'),
      archived: cell(row, 'ARCHIVED'),
      archived_date: cell(row, 'ARCHIVEDDATE'),
      comments: comments.get(id) ?? [],
      links: links.get(id) ?? [],
      status_changes: statusChanges.get(id) ?? [],
    };
  });
}

// ─── Partitioning ────────────────────────────────────────────

export interface KeyPartition<T> {
  found_issues: Record<string, T>;
  not_found: string[];
}

/**
 * Split requested keys into found records and missing keys, both in
 * request order.
 */
export function partitionByKey<T extends { key: Cell }>(
  requestedKeys: readonly string[],
  records: readonly T[]
): KeyPartition<T> {
  const byKey = new Map<string, T>();
  for (const record of records) {
    byKey.set(text(record.key), record);
  }

  const found_issues: Record<string, T> = {};
  const not_found: string[] = [];
  for (const key of requestedKeys) {
    const record = byKey.get(key);
    if (record) {
      found_issues[key] = record;
    } else {
      not_found.push(key);
    }
  }
  return { found_issues, not_found };
}

// ─── Aggregates & Lookups ────────────────────────────────────

/** Reduce `GROUP BY PROJECT, ISSUESTATUS, PRIORITY` rows into per-project counts. */
export function summarizeProjects(result: QueryResult): ProjectSummary {
  const projects: ProjectSummary['projects'] = {};
  let totalIssues = 0;

  for (const row of rowsToObjects(result)) {
    const project = labelOrUnknown(cell(row, 'PROJECT'));
    const status = labelOrUnknown(cell(row, 'ISSUESTATUS'));
    const priority = labelOrUnknown(cell(row, 'PRIORITY'));
    const rawCount = cell(row, 'ISSUE_COUNT');
    const count = rawCount === null ? 0 : Number(rawCount) || 0;

    const stats = projects[project] ?? { total_issues: 0, statuses: {}, priorities: {} };
    projects[project] = stats;
    stats.total_issues += count;
    stats.statuses[status] = (stats.statuses[status] ?? 0) + count;
    stats.priorities[priority] = (stats.priorities[priority] ?? 0) + count;
    totalIssues += count;
  }

  return {
    total_issues: totalIssues,
    total_projects: Object.keys(projects).length,
    projects,
  };
}

function labelOrUnknown(value: Cell): string {
  return value === null || value === '' ? 'Unknown' : String(value);
}

export function toComponents(result: QueryResult): JiraComponent[] {
  return rowsToObjects(result).map((row) => ({
    id: cell(row, 'ID'),
    project: cell(row, 'PROJECT'),
    name: cell(row, 'CNAME'),
    description: text(cell(row, 'DESCRIPTION')),
    url: cell(row, 'URL'),
    lead: cell(row, 'LEAD'),
    assignee_type: cell(row, 'ASSIGNEETYPE'),
    archived: cell(row, 'ARCHIVED'),
    deleted: cell(row, 'DELETED'),
  }));
}

export function toSprint(result: QueryResult): JiraSprint | null {
  const row = rowsToObjects(result)[0];
  if (!row) return null;
  return {
    id: cell(row, 'ID'),
    name: cell(row, 'NAME'),
    start_date: cell(row, 'START_DATE'),
    end_date: cell(row, 'END_DATE'),
    complete_date: cell(row, 'COMPLETE_DATE'),
    goal: cell(row, 'GOAL'),
  };
}
