/**
 * Tool Types
 * Registered tools pair an advertised JSON parameter schema with the zod
 * schema that validates the same arguments
 */

import { z } from 'zod';
import { BrowserProvider } from '../../lib/browser';
import { HttpClient } from '../../lib/http/http.types';
import { LighthouseRunner } from '../../lib/lighthouse/lighthouse.types';
import { CertificateInspector } from '../../lib/tls/tls.types';
import { ToolResult } from '../../lib/tools/tool-result';
import { Sleep } from '../../lib/utils/async';

/**
 * Capabilities every tool draws from; injected so tests can substitute fakes
 */
export interface ToolContext {
  browser: BrowserProvider;
  http: HttpClient;
  certificates: CertificateInspector;
  lighthouse: LighthouseRunner;
  sleep: Sleep;
  now: () => Date;
  youtubeApiKey: string | undefined;
}

export type JsonSchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'array';

export interface JsonSchemaProperty {
  type: JsonSchemaType;
  description: string;
  default?: string | number | boolean;
  minimum?: number;
  exclusiveMinimum?: number;
  maximum?: number;
  items?: { type: JsonSchemaType };
  maxItems?: number;
}

export interface ToolParameters {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: ToolParameters;
}

/**
 * Returns a failure message, or null when the tool may run
 */
export type Precondition<A> = (args: A, context: ToolContext) => Promise<string | null> | string | null;

export interface ToolSpec<S extends z.ZodTypeAny> {
  definition: ToolDescriptor;
  schema: S;
  preconditions?: Array<Precondition<z.output<S>>>;
  handler: (args: z.output<S>, context: ToolContext) => Promise<ToolResult<unknown>>;
}

/**
 * A tool with its argument type erased; `run` validates raw arguments itself
 */
export interface RegisteredTool {
  definition: ToolDescriptor;
  run(rawArgs: unknown, context: ToolContext): Promise<ToolResult<unknown>>;
}
