/**
 * Jira record types returned by the tools.
 *
 * Field names are snake_case: these objects are serialized as-is into the
 * tool results. Scalar values keep whatever the warehouse returned, so ids
 * are numbers and absent values are null.
 */

import type { Cell } from '../warehouse/types.js';

export interface JiraComment {
  id: Cell;
  role_level: Cell;
  body: Cell;
  created: Cell;
  updated: Cell;
}

export interface JiraIssueLink {
  link_id: Cell;
  link_type: Cell;
  /** Which end of the link this issue is: the source is `outward`. */
  relationship: 'outward' | 'inward';
  /** Link-type phrase read from this issue, e.g. "blocks" or "is blocked by". */
  relationship_description: Cell;
  sequence: Cell;
  related_issue_id: Cell;
  related_issue_key: Cell;
  related_issue_summary: Cell;
}

export interface JiraStatusChange {
  from_status: Cell;
  to_status: Cell;
  status_transition: string;
  changed_at: Cell;
}

/** Issue in list form: truncated description, no comments or history. */
export interface JiraIssueSummary {
  id: Cell;
  key: Cell;
  project: Cell;
  issue_number: Cell;
  issue_type: Cell;
  summary: Cell;
  description: string;
  priority: Cell;
  status: Cell;
  resolution: Cell;
  created: Cell;
  updated: Cell;
  due_date: Cell;
  resolution_date: Cell;
  votes: Cell;
  watches: Cell;
  labels: string[];
  versions: string[];
  affected_versions: string[];
  components: string[];
}

export interface JiraIssueDetail extends JiraIssueSummary {
  environment: Cell;
  time_original_estimate: Cell;
  time_estimate: Cell;
  time_spent: Cell;
  workflow_id: Cell;
  security: Cell;
  archived: Cell;
  archived_date: Cell;
  comments: JiraComment[];
  links: JiraIssueLink[];
  status_changes: JiraStatusChange[];
}

export interface JiraComponent {
  id: Cell;
  project: Cell;
  name: Cell;
  description: string;
  url: Cell;
  lead: Cell;
  assignee_type: Cell;
  archived: Cell;
  deleted: Cell;
}

export interface JiraSprint {
  id: Cell;
  name: Cell;
  start_date: Cell;
  end_date: Cell;
  complete_date: Cell;
  goal: Cell;
}

export interface ProjectStats {
  total_issues: number;
  statuses: Record<string, number>;
  priorities: Record<string, number>;
}

export interface ProjectSummary {
  total_issues: number;
  total_projects: number;
  projects: Record<string, ProjectStats>;
}
