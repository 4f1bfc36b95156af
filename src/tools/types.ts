/**
 * Tool Types
 *
 * Each tool pairs the JSON Schema shown to clients with the Zod schema
 * that validates incoming arguments and the handler that runs them.
 */

import type { z } from 'zod';
import { parseArgs } from '../validators.js';
import type { QueryExecutor } from '../warehouse/warehouse-client.js';
import type { ServerSettings } from '../config/types.js';

/** Process-wide dependencies handed to every handler. */
export interface ToolContext {
  warehouse: QueryExecutor;
  settings: Pick<ServerSettings, 'batch' | 'sprintCustomFieldId'>;
}

export interface JsonSchemaObject {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: JsonSchemaObject;
  schema: S;
  handler: (args: z.output<S>, ctx: ToolContext) => Promise<unknown>;
}

/** A tool with its argument type erased, ready for dispatch. */
export interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: JsonSchemaObject;
  run: (args: unknown, ctx: ToolContext) => Promise<unknown>;
}

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    run: (args, ctx) => definition.handler(parseArgs(definition.schema, args), ctx),
  };
}
