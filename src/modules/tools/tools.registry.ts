/**
 * Tool Registry
 * Name lookup plus the shared argument and precondition stage
 */

import { z } from 'zod';
import { errorMessage, fail, ToolResult } from '../../lib/tools/tool-result';
import { RegisteredTool, ToolContext, ToolDescriptor, ToolSpec } from './tools.types';

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Erase a tool's argument type behind validation of the raw arguments
 */
export function defineTool<S extends z.ZodTypeAny>(tool: ToolSpec<S>): RegisteredTool {
  return {
    definition: tool.definition,
    async run(rawArgs: unknown, context: ToolContext): Promise<ToolResult<unknown>> {
      const parsed = tool.schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        return fail(`Invalid arguments: ${formatIssues(parsed.error)}`);
      }
      const args: z.output<S> = parsed.data;

      for (const check of tool.preconditions ?? []) {
        const problem = await check(args, context);
        if (problem) {
          return fail(problem);
        }
      }

      return tool.handler(args, context);
    },
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(
    private readonly context: ToolContext,
    tools: RegisteredTool[]
  ) {
    for (const tool of tools) {
      if (this.tools.has(tool.definition.name)) {
        throw new Error(`Duplicate tool name: ${tool.definition.name}`);
      }
      this.tools.set(tool.definition.name, tool);
    }
  }

  list(): ToolDescriptor[] {
    return Array.from(this.tools.values(), (tool) => tool.definition);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Run a tool by name. Never rejects: anything a tool throws becomes a failure.
   */
  async invoke(name: string, rawArgs: unknown): Promise<ToolResult<unknown>> {
    const tool = this.tools.get(name);
    if (!tool) {
      return fail(`Unknown tool: ${name}`);
    }

    try {
      return await tool.run(rawArgs, this.context);
    } catch (error) {
      console.error(`${name}: Unhandled tool error: ${errorMessage(error)}`);
      return fail(`${name} failed: ${errorMessage(error)}`);
    }
  }
}
