/**
 * Tools Router
 * Route definitions for the tool-calling endpoints
 */

import { Router } from 'express';
import { ToolsController } from './tools.controller';
import { ToolRegistry } from './tools.registry';

export function createToolsRouter(registry: ToolRegistry): Router {
  const router = Router();
  const controller = new ToolsController(registry);

  /**
   * @route   GET /api/tools
   * @desc    List tools with their parameter schemas
   * @access  Public
   */
  router.get('/', controller.listTools);

  /**
   * @route   POST /api/tools/:name
   * @desc    Invoke a tool with a JSON object of arguments
   * @access  Public
   */
  router.post('/:name', controller.invokeTool);

  return router;
}
