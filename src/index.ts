#!/usr/bin/env node

/**
 * Jira Snowflake MCP Server
 *
 * Read-only access to a Jira instance replicated into Snowflake tables,
 * queried through the Snowflake SQL API.
 *
 * Tools:
 *   Issues:     list_jira_issues, get_jira_issue_details, get_jira_issue_links
 *   Planning:   get_jira_issues_by_sprint, list_jira_components
 *   Aggregates: get_jira_project_summary
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { resolveSettings } from './config/settings.js';
import { WarehouseClient } from './warehouse/warehouse-client.js';
import { callTool, listTools } from './tools/registry.js';
import type { ToolContext } from './tools/types.js';

const SERVER_NAME = 'jira-snowflake-mcp';
const SERVER_VERSION = '0.1.0';

const SERVER_INSTRUCTIONS = `Read-only Jira data served from a Snowflake replica.

Use these tools when the user asks about Jira issues, projects, sprints or components:
- Finding or filtering issues (project, status, priority, text, recent activity) → list_jira_issues
- Full records with comments, links and status history for known keys → get_jira_issue_details
- What blocks or relates to an issue → get_jira_issue_links
- Issues in a named sprint → get_jira_issues_by_sprint
- Issue counts per project, status and priority → get_jira_project_summary
- Component catalog → list_jira_components

Status, priority and issue type are numeric ids, not display names.`;

// ─── Start Server ────────────────────────────────────────────

async function main() {
  const settings = resolveSettings();
  const warehouse = new WarehouseClient({
    snowflake: settings.snowflake,
    limits: settings.limits,
    cache: settings.cache,
  });
  const ctx: ToolContext = { warehouse, settings };

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: { tools: {} },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, () => {
    return { tools: listTools() };
  });

  server.setRequestHandler(CallToolRequestSchema, (request) => {
    const { name, arguments: args } = request.params;
    return callTool(name, args, ctx);
  });

  const shutdown = (signal: string): void => {
    console.error(`[jira-snowflake] Received ${signal}, shutting down`);
    warehouse.close();
    server
      .close()
      .catch((error: unknown) => {
        console.error('[jira-snowflake] Error while closing server:', error);
      })
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[jira-snowflake] MCP server v${SERVER_VERSION} started`);
}

main().catch((error) => {
  console.error('[jira-snowflake] Fatal error:', error);
  process.exit(1);
});
