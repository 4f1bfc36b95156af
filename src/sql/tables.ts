/**
 * Identifier Allow-List
 *
 * Every table and column name that appears in generated SQL comes from
 * this module. Builders pick identifiers from here; caller input only
 * ever reaches SQL as a bound parameter.
 */

export const TABLES = {
  issue: 'JIRA_ISSUE_NON_PII',
  label: 'JIRA_LABEL_RHAI',
  comment: 'JIRA_COMMENT_NON_PII',
  issueLink: 'JIRA_ISSUELINK_RHAI',
  issueLinkType: 'JIRA_ISSUELINKTYPE_RHAI',
  component: 'JIRA_COMPONENT_RHAI',
  nodeAssociation: 'JIRA_NODEASSOCIATION_RHAI',
  projectVersion: 'JIRA_PROJECTVERSION_RHAI',
  changeGroup: 'JIRA_CHANGEGROUP_RHAI',
  changeItem: 'JIRA_CHANGEITEM_RHAI',
  sprint: 'JIRA_SPRINT_RHAI',
  customFieldValue: 'JIRA_CUSTOMFIELDVALUE_NON_PII',
} as const;

/** Node association types linking an issue to components and versions. */
export const ASSOCIATION = {
  component: 'IssueComponent',
  fixVersion: 'IssueFixVersion',
  affectedVersion: 'IssueVersion',
} as const;

/** Issue columns returned in list (summary) form. Description is truncated. */
export const ISSUE_SUMMARY_COLUMNS = [
  'ID',
  'ISSUE_KEY',
  'PROJECT',
  'ISSUENUM',
  'ISSUETYPE',
  'SUMMARY',
  'SUBSTR(DESCRIPTION, 1, 500) AS DESCRIPTION',
  'PRIORITY',
  'ISSUESTATUS',
  'RESOLUTION',
  'CREATED',
  'UPDATED',
  'DUEDATE',
  'RESOLUTIONDATE',
  'VOTES',
  'WATCHES',
] as const;

/** Issue columns returned by detail lookups. */
export const ISSUE_DETAIL_COLUMNS = [
  'ID',
  'ISSUE_KEY',
  'PROJECT',
  'ISSUENUM',
  'ISSUETYPE',
  'SUMMARY',
  'DESCRIPTION',
  'PRIORITY',
  'ISSUESTATUS',
  'RESOLUTION',
  'CREATED',
  'UPDATED',
  'DUEDATE',
  'RESOLUTIONDATE',
  'VOTES',
  'WATCHES',
  'ENVIRONMENT',
  'TIMEORIGINALESTIMATE',
  'TIMEESTIMATE',
  'TIMESPENT',
  'WORKFLOW_ID',
  'SECURITY',
  'ARCHIVED',
  'ARCHIVEDDATE',
] as const;

export const COMPONENT_COLUMNS = [
  'ID',
  'PROJECT',
  'CNAME',
  'DESCRIPTION',
  'URL',
  'LEAD',
  'ASSIGNEETYPE',
  'ARCHIVED',
  'DELETED',
] as const;

/** Date columns a day window can apply to. `timeframe` ORs all of them. */
export const ISSUE_DATE_COLUMNS = {
  created: 'CREATED',
  updated: 'UPDATED',
  resolved: 'RESOLUTIONDATE',
} as const;

export type IssueDateColumn = (typeof ISSUE_DATE_COLUMNS)[keyof typeof ISSUE_DATE_COLUMNS];
