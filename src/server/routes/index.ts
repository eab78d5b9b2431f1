/**
 * Route composition
 * Creates and configures the main router with all route modules
 */

import { Router } from './router.js';
import { registerHealthRoutes } from './health.js';
import { registerSimulationRoutes } from './simulation.js';
import { registerDbRoutes } from './db.js';
import { registerConfigRoutes } from './config.js';

/**
 * Create and configure the main router with all routes
 */
export function createRouter(): Router {
  const router = new Router();

  registerHealthRoutes(router);
  registerSimulationRoutes(router);
  registerDbRoutes(router);
  registerConfigRoutes(router);

  return router;
}

export { Router } from './router.js';
export type { HttpMethod, RouteHandler, RouteParams } from './router.js';
