/**
 * Tools Controller
 * HTTP request/response handling for tool listing and invocation
 */

import { Request, Response } from 'express';
import { ApiError, asyncHandler } from '../../middleware/error-handler';
import { toWire } from '../../lib/tools/tool-result';
import { elapsedSeconds } from '../audit/audit.utils';
import { ToolRegistry } from './tools.registry';

export class ToolsController {
  constructor(private readonly registry: ToolRegistry) {}

  /**
   * GET /api/tools
   */
  listTools = asyncHandler(async (req: Request, res: Response) => {
    res.json({ success: true, tools: this.registry.list() });
  });

  /**
   * POST /api/tools/:name
   * Tool failures are still HTTP 200; the body carries `error`
   */
  invokeTool = asyncHandler(async (req: Request, res: Response) => {
    const { name } = req.params;

    if (!this.registry.has(name)) {
      throw new ApiError(404, `Tool not found: ${name}`);
    }

    const startTime = Date.now();
    const result = await this.registry.invoke(name, req.body);
    console.log(`${name}: ${result.ok ? 'completed' : 'failed'} in ${elapsedSeconds(startTime)}s`);

    res.json(toWire(result));
  });
}
