/**
 * SQL Builder
 *
 * Turns optional, typed filters into parameterized Snowflake SQL.
 * Pure functions: no I/O, no shared state.
 *
 * Rules every builder follows:
 *   - identifiers come from tables.ts, values are `?` parameters
 *   - one AND-joined predicate per active filter, nothing for inactive ones
 *   - an empty IN list becomes `1 = 0` instead of `IN ()`
 *   - ORDER BY is explicit so LIMIT truncation is reproducible
 *   - LIMIT is always the last parameter
 */

import { ValidationError } from '../errors.js';
import {
  ASSOCIATION,
  COMPONENT_COLUMNS,
  ISSUE_DATE_COLUMNS,
  ISSUE_DETAIL_COLUMNS,
  ISSUE_SUMMARY_COLUMNS,
  TABLES,
  type IssueDateColumn,
} from './tables.js';

export type SqlParam = string | number;

export interface SqlStatement {
  readonly text: string;
  readonly params: readonly SqlParam[];
}

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 1000;
export const MAX_DAY_WINDOW = 3650;
export const MAX_COMPONENT_FILTERS = 100;
export const MAX_ISSUE_KEYS = 500;

const PROJECT_KEY_PATTERN = /^[A-Z][A-Z0-9_]*$/;
const ISSUE_KEY_PATTERN = /^[A-Z][A-Z0-9_]*-\d+$/;
const NUMERIC_ID_PATTERN = /^\d+$/;

// ─── Filter Sets ─────────────────────────────────────────────

export interface IssueFilters {
  project?: string;
  issueType?: string;
  status?: string;
  priority?: string;
  searchText?: string;
  components?: readonly string[];
  version?: string;
  createdDays?: number;
  updatedDays?: number;
  resolvedDays?: number;
  /** Matches issues created, updated or resolved within this many days. */
  timeframe?: number;
  issueKeys?: readonly string[];
  sprint?: { fieldId: string; sprintId: string };
  limit?: number;
}

export interface ComponentFilters {
  projectId?: string;
  archived?: boolean;
  deleted?: boolean;
  searchText?: string;
  limit?: number;
}

// ─── Predicates ──────────────────────────────────────────────

/**
 * Accumulates AND-joined predicates and their parameters in placeholder order.
 */
class PredicateList {
  private readonly clauses: string[] = [];
  private readonly params: SqlParam[] = [];

  add(clause: string, ...params: SqlParam[]): void {
    this.clauses.push(clause);
    this.params.push(...params);
  }

  addIn(column: string, values: readonly SqlParam[]): void {
    if (values.length === 0) {
      this.clauses.push('1 = 0');
      return;
    }
    this.add(`${column} IN (${placeholders(values.length)})`, ...values);
  }

  whereClause(): string {
    return this.clauses.length > 0 ? `WHERE ${this.clauses.join(' AND ')}` : '';
  }

  boundParams(): SqlParam[] {
    return [...this.params];
  }
}

function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

/**
 * Case-insensitive "contains" pattern. `!` is the LIKE escape character,
 * so literal `!`, `%` and `_` in the fragment are prefixed with it.
 */
export function containsPattern(fragment: string): string {
  const escaped = fragment.toLowerCase().replace(/[!%_]/g, (ch) => `!${ch}`);
  return `%${escaped}%`;
}

function searchPredicate(columns: readonly string[], fragment: string): [string, SqlParam[]] {
  const pattern = containsPattern(fragment);
  const clause = columns.map((column) => `LOWER(${column}) LIKE ? ESCAPE '!'`).join(' OR ');
  return [`(${clause})`, columns.map(() => pattern)];
}

function dayWindowPredicate(column: IssueDateColumn): string {
  return `${column} >= DATEADD('day', -?, SYSDATE())`;
}

// ─── Validation ──────────────────────────────────────────────

export function validateLimit(limit: number | undefined): number {
  const value = limit ?? DEFAULT_LIMIT;
  if (!Number.isInteger(value) || value <= 0 || value > MAX_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_LIMIT}, got ${value}`);
  }
  return value;
}

function validateNumericId(name: string, value: string): string {
  if (!NUMERIC_ID_PATTERN.test(value)) {
    throw new ValidationError(`${name} must be a numeric id, got '${value}'`);
  }
  return value;
}

function validateDayWindow(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0 || value > MAX_DAY_WINDOW) {
    throw new ValidationError(
      `${name} must be an integer number of days between 1 and ${MAX_DAY_WINDOW}, got ${value}`
    );
  }
  return value;
}

export function normalizeProjectKey(value: string): string {
  const key = value.trim().toUpperCase();
  if (!PROJECT_KEY_PATTERN.test(key)) {
    throw new ValidationError(`project must be a project key such as 'SMQE', got '${value}'`);
  }
  return key;
}

export function normalizeIssueKey(value: string): string {
  const key = value.trim().toUpperCase();
  if (!ISSUE_KEY_PATTERN.test(key)) {
    throw new ValidationError(`'${value}' is not a valid issue key (expected e.g. 'SMQE-1280')`);
  }
  return key;
}

/**
 * Normalize a requested key list: validate, upper-case, drop duplicates
 * while keeping first-seen order.
 */
export function normalizeIssueKeys(values: readonly string[]): string[] {
  if (values.length > MAX_ISSUE_KEYS) {
    throw new ValidationError(
      `At most ${MAX_ISSUE_KEYS} issue keys can be requested at once, got ${values.length}`
    );
  }
  return [...new Set(values.map(normalizeIssueKey))];
}

// ─── Issue Statements ────────────────────────────────────────

function issuePredicates(filters: IssueFilters): PredicateList {
  const predicates = new PredicateList();

  if (filters.project) {
    predicates.add('PROJECT = ?', normalizeProjectKey(filters.project));
  }
  if (filters.issueType) {
    predicates.add('ISSUETYPE = ?', validateNumericId('issue_type', filters.issueType));
  }
  if (filters.status) {
    predicates.add('ISSUESTATUS = ?', validateNumericId('status', filters.status));
  }
  if (filters.priority) {
    predicates.add('PRIORITY = ?', validateNumericId('priority', filters.priority));
  }
  if (filters.searchText) {
    const [clause, params] = searchPredicate(['SUMMARY', 'DESCRIPTION'], filters.searchText);
    predicates.add(clause, ...params);
  }
  if (filters.components) {
    if (filters.components.length > MAX_COMPONENT_FILTERS) {
      throw new ValidationError(`At most ${MAX_COMPONENT_FILTERS} components can be filtered on`);
    }
    if (filters.components.length === 0) {
      predicates.addIn('ID', []);
    } else {
      predicates.add(
        `ID IN (SELECT na.SOURCE_NODE_ID FROM ${TABLES.nodeAssociation} na ` +
          `JOIN ${TABLES.component} c ON c.ID = na.SINK_NODE_ID ` +
          `WHERE na.ASSOCIATION_TYPE = '${ASSOCIATION.component}' ` +
          `AND c.CNAME IN (${placeholders(filters.components.length)}))`,
        ...filters.components
      );
    }
  }
  if (filters.version) {
    predicates.add(
      `ID IN (SELECT na.SOURCE_NODE_ID FROM ${TABLES.nodeAssociation} na ` +
        `JOIN ${TABLES.projectVersion} v ON v.ID = na.SINK_NODE_ID ` +
        `WHERE na.ASSOCIATION_TYPE = '${ASSOCIATION.fixVersion}' AND v.VNAME = ?)`,
      filters.version
    );
  }
  if (filters.createdDays !== undefined) {
    predicates.add(
      dayWindowPredicate(ISSUE_DATE_COLUMNS.created),
      validateDayWindow('created_days', filters.createdDays)
    );
  }
  if (filters.updatedDays !== undefined) {
    predicates.add(
      dayWindowPredicate(ISSUE_DATE_COLUMNS.updated),
      validateDayWindow('updated_days', filters.updatedDays)
    );
  }
  if (filters.resolvedDays !== undefined) {
    predicates.add(
      dayWindowPredicate(ISSUE_DATE_COLUMNS.resolved),
      validateDayWindow('resolved_days', filters.resolvedDays)
    );
  }
  if (filters.timeframe !== undefined) {
    // AND-ed with any specific window above
    const days = validateDayWindow('timeframe', filters.timeframe);
    const columns = Object.values(ISSUE_DATE_COLUMNS);
    predicates.add(
      `(${columns.map(dayWindowPredicate).join(' OR ')})`,
      ...columns.map(() => days)
    );
  }
  if (filters.issueKeys) {
    predicates.addIn('ISSUE_KEY', normalizeIssueKeys(filters.issueKeys));
  }
  if (filters.sprint) {
    predicates.add(
      `ID IN (SELECT cfv.ISSUE FROM ${TABLES.customFieldValue} cfv ` +
        `WHERE cfv.CUSTOMFIELD = ? AND cfv.STRINGVALUE = ?)`,
      Number(validateNumericId('sprint field', filters.sprint.fieldId)),
      filters.sprint.sprintId
    );
  }

  return predicates;
}

/**
 * Issue list in summary form, newest first.
 */
export function buildIssueListStatement(filters: IssueFilters): SqlStatement {
  const limit = validateLimit(filters.limit);
  const predicates = issuePredicates(filters);
  const text = [
    `SELECT ${ISSUE_SUMMARY_COLUMNS.join(', ')}`,
    `FROM ${TABLES.issue}`,
    predicates.whereClause(),
    'ORDER BY CREATED DESC, ID DESC',
    'LIMIT ?',
  ]
    .filter(Boolean)
    .join('\n');
  return { text, params: [...predicates.boundParams(), limit] };
}

/**
 * Full issue rows for a set of keys. The limit is the key count, so
 * every requested key can be returned.
 */
export function buildIssueDetailStatement(issueKeys: readonly string[]): SqlStatement {
  const keys = normalizeIssueKeys(issueKeys);
  const predicates = new PredicateList();
  predicates.addIn('ISSUE_KEY', keys);
  const text = [
    `SELECT ${ISSUE_DETAIL_COLUMNS.join(', ')}`,
    `FROM ${TABLES.issue}`,
    predicates.whereClause(),
    'ORDER BY ISSUE_KEY ASC',
    'LIMIT ?',
  ].join('\n');
  return { text, params: [...predicates.boundParams(), Math.max(keys.length, 1)] };
}

export function buildIssueIdLookupStatement(issueKey: string): SqlStatement {
  return {
    text: `SELECT ID, ISSUE_KEY FROM ${TABLES.issue} WHERE ISSUE_KEY = ? LIMIT 1`,
    params: [normalizeIssueKey(issueKey)],
  };
}

// ─── Child Collections ───────────────────────────────────────

function childStatement(
  select: string,
  from: string,
  idColumn: string,
  issueIds: readonly number[],
  orderBy: string,
  extraPredicates: string[] = []
): SqlStatement {
  const predicates = new PredicateList();
  predicates.addIn(idColumn, issueIds);
  for (const clause of extraPredicates) {
    predicates.add(clause);
  }
  return {
    text: [`SELECT ${select}`, `FROM ${from}`, predicates.whereClause(), `ORDER BY ${orderBy}`].join(
      '\n'
    ),
    params: predicates.boundParams(),
  };
}

export function buildLabelsStatement(issueIds: readonly number[]): SqlStatement {
  return childStatement('ISSUE, LABEL', TABLES.label, 'ISSUE', issueIds, 'ISSUE ASC, LABEL ASC', [
    'LABEL IS NOT NULL',
  ]);
}

export function buildCommentsStatement(issueIds: readonly number[]): SqlStatement {
  return childStatement(
    'ID, ISSUEID, ROLELEVEL, BODY, CREATED, UPDATED',
    TABLES.comment,
    'ISSUEID',
    issueIds,
    'ISSUEID ASC, CREATED ASC, ID ASC',
    ['BODY IS NOT NULL']
  );
}

export function buildVersionsStatement(issueIds: readonly number[]): SqlStatement {
  return childStatement(
    'na.SOURCE_NODE_ID AS ISSUE, na.ASSOCIATION_TYPE AS ASSOCIATION_TYPE, v.VNAME AS VNAME',
    `${TABLES.nodeAssociation} na JOIN ${TABLES.projectVersion} v ON v.ID = na.SINK_NODE_ID`,
    'na.SOURCE_NODE_ID',
    issueIds,
    'na.SOURCE_NODE_ID ASC, v.SEQUENCE ASC, v.VNAME ASC',
    [
      `na.ASSOCIATION_TYPE IN ('${ASSOCIATION.fixVersion}', '${ASSOCIATION.affectedVersion}')`,
    ]
  );
}

export function buildIssueComponentsStatement(issueIds: readonly number[]): SqlStatement {
  return childStatement(
    'na.SOURCE_NODE_ID AS ISSUE, c.CNAME AS CNAME',
    `${TABLES.nodeAssociation} na JOIN ${TABLES.component} c ON c.ID = na.SINK_NODE_ID`,
    'na.SOURCE_NODE_ID',
    issueIds,
    'na.SOURCE_NODE_ID ASC, c.CNAME ASC',
    [`na.ASSOCIATION_TYPE = '${ASSOCIATION.component}'`]
  );
}

export function buildStatusChangesStatement(issueIds: readonly number[]): SqlStatement {
  return childStatement(
    'cg.ISSUEID AS ISSUEID, cg.CREATED AS CHANGE_TIMESTAMP, ' +
      'ci.OLDSTRING AS FROM_STATUS, ci.NEWSTRING AS TO_STATUS',
    `${TABLES.changeGroup} cg JOIN ${TABLES.changeItem} ci ON ci.GROUPID = cg.ID`,
    'cg.ISSUEID',
    issueIds,
    'cg.ISSUEID ASC, cg.CREATED ASC, ci.ID ASC',
    ["ci.FIELD = 'status'"]
  );
}

/**
 * Links touching any of the given issues, in either direction, with the
 * link type names and both endpoint keys.
 */
export function buildLinksStatement(issueIds: readonly number[]): SqlStatement {
  if (issueIds.length === 0) {
    return childStatement('l.ID AS LINK_ID', `${TABLES.issueLink} l`, 'l.SOURCE', [], 'l.ID ASC');
  }
  const marks = placeholders(issueIds.length);
  const text = [
    'SELECT l.ID AS LINK_ID, l.SOURCE AS SOURCE, l.DESTINATION AS DESTINATION, ' +
      'l.SEQUENCE AS SEQUENCE, t.LINKNAME AS LINKNAME, t.INWARD AS INWARD, t.OUTWARD AS OUTWARD, ' +
      's.ISSUE_KEY AS SOURCE_KEY, d.ISSUE_KEY AS DESTINATION_KEY, ' +
      's.SUMMARY AS SOURCE_SUMMARY, d.SUMMARY AS DESTINATION_SUMMARY',
    `FROM ${TABLES.issueLink} l`,
    `JOIN ${TABLES.issueLinkType} t ON t.ID = l.LINKTYPE`,
    `LEFT JOIN ${TABLES.issue} s ON s.ID = l.SOURCE`,
    `LEFT JOIN ${TABLES.issue} d ON d.ID = l.DESTINATION`,
    `WHERE (l.SOURCE IN (${marks}) OR l.DESTINATION IN (${marks}))`,
    'ORDER BY l.ID ASC',
  ].join('\n');
  return { text, params: [...issueIds, ...issueIds] };
}

// ─── Aggregates & Lookups ────────────────────────────────────

export function buildProjectSummaryStatement(): SqlStatement {
  return {
    text: [
      'SELECT PROJECT, ISSUESTATUS, PRIORITY, COUNT(*) AS ISSUE_COUNT',
      `FROM ${TABLES.issue}`,
      'GROUP BY PROJECT, ISSUESTATUS, PRIORITY',
      'ORDER BY PROJECT ASC, ISSUESTATUS ASC, PRIORITY ASC',
    ].join('\n'),
    params: [],
  };
}

/**
 * Sprint by exact name. Sprint names can repeat across boards; the most
 * recently created (highest id) wins.
 */
export function buildSprintLookupStatement(sprintName: string): SqlStatement {
  const name = sprintName.trim();
  if (!name) {
    throw new ValidationError('sprint_name must be a non-empty string');
  }
  return {
    text: [
      'SELECT ID, NAME, START_DATE, END_DATE, COMPLETE_DATE, GOAL',
      `FROM ${TABLES.sprint}`,
      'WHERE NAME = ?',
      'ORDER BY ID DESC',
      'LIMIT 1',
    ].join('\n'),
    params: [name],
  };
}

export function buildComponentListStatement(filters: ComponentFilters): SqlStatement {
  const limit = validateLimit(filters.limit);
  const predicates = new PredicateList();

  if (filters.projectId) {
    predicates.add('PROJECT = ?', Number(validateNumericId('project', filters.projectId)));
  }
  if (filters.archived !== undefined) {
    predicates.add('ARCHIVED = ?', filters.archived ? 'Y' : 'N');
  }
  if (filters.deleted !== undefined) {
    predicates.add('DELETED = ?', filters.deleted ? 'Y' : 'N');
  }
  if (filters.searchText) {
    const [clause, params] = searchPredicate(['CNAME', 'DESCRIPTION'], filters.searchText);
    predicates.add(clause, ...params);
  }

  const text = [
    `SELECT ${COMPONENT_COLUMNS.join(', ')}`,
    `FROM ${TABLES.component}`,
    predicates.whereClause(),
    'ORDER BY CNAME ASC, ID ASC',
    'LIMIT ?',
  ]
    .filter(Boolean)
    .join('\n');
  return { text, params: [...predicates.boundParams(), limit] };
}
