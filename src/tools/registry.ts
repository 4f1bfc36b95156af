/**
 * Tool Registry
 *
 * Static list of the MCP tools and the dispatcher that runs them.
 */

import { ValidationError, toErrorPayload } from '../errors.js';
import type { RegisteredTool, ToolContext, ToolResult } from './types.js';
import { listIssuesTool } from './list-issues.js';
import { issueDetailsTool } from './issue-details.js';
import { projectSummaryTool } from './project-summary.js';
import { issueLinksTool } from './issue-links.js';
import { sprintIssuesTool } from './sprint-issues.js';
import { listComponentsTool } from './list-components.js';

// ─── Registry ────────────────────────────────────────────────

export const TOOLS: readonly RegisteredTool[] = [
  listIssuesTool,
  issueDetailsTool,
  projectSummaryTool,
  issueLinksTool,
  sprintIssuesTool,
  listComponentsTool,
];

const TOOLS_BY_NAME = new Map(TOOLS.map((tool) => [tool.name, tool]));

export function listTools(): Array<Pick<RegisteredTool, 'name' | 'description' | 'inputSchema'>> {
  return TOOLS.map(({ name, description, inputSchema }) => ({ name, description, inputSchema }));
}

/**
 * Run a tool by name. Never throws: failures become an `isError` result
 * carrying the structured error payload.
 */
export async function callTool(
  name: string,
  args: unknown,
  ctx: ToolContext
): Promise<ToolResult> {
  try {
    const tool = TOOLS_BY_NAME.get(name);
    if (!tool) {
      throw new ValidationError(`Unknown tool: ${name}`);
    }
    const result = await tool.run(args, ctx);
    return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  } catch (error) {
    if (!(error instanceof ValidationError)) {
      console.error(
        `[jira-snowflake] Tool ${name} failed:`,
        error instanceof Error ? error.message : error
      );
    }
    return {
      content: [{ type: 'text', text: JSON.stringify(toErrorPayload(error), null, 2) }],
      isError: true,
    };
  }
}
