/**
 * list_jira_components: component catalog with optional filters.
 */

import { buildComponentListStatement } from '../sql/sql-builder.js';
import { toComponents } from '../assembler/result-assembler.js';
import { ListComponentsArgsSchema, type ListComponentsArgs } from '../validators.js';
import { defineTool, type ToolContext } from './types.js';
import type { JiraComponent } from '../types/jira.js';

export interface ListComponentsResult {
  components: JiraComponent[];
  total_returned: number;
  filters_applied: ListComponentsArgs;
}

export async function listJiraComponents(
  args: ListComponentsArgs,
  ctx: ToolContext
): Promise<ListComponentsResult> {
  const result = await ctx.warehouse.execute(
    buildComponentListStatement({
      projectId: args.project,
      archived: args.archived,
      deleted: args.deleted,
      searchText: args.search_text,
      limit: args.limit,
    })
  );
  const components = toComponents(result);

  return {
    components,
    total_returned: components.length,
    filters_applied: args,
  };
}

export const listComponentsTool = defineTool({
  name: 'list_jira_components',
  description:
    'List JIRA components, ordered by name. Filter by project id, archived or deleted state, or text in the name or description.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      project: {
        type: 'string' as const,
        description: 'Project id (numeric string)',
      },
      archived: {
        type: 'boolean' as const,
        description: 'true for archived components only, false to exclude them',
      },
      deleted: {
        type: 'boolean' as const,
        description: 'true for deleted components only, false to exclude them',
      },
      search_text: {
        type: 'string' as const,
        description: 'Case-insensitive text to find in name or description',
      },
      limit: {
        type: 'number' as const,
        description: 'Maximum components to return (1-1000, default 50)',
      },
    },
  },
  schema: ListComponentsArgsSchema,
  handler: listJiraComponents,
});
