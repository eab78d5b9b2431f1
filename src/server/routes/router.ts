/**
 * Simple HTTP router for the API server
 * Supports exact paths and parameterized paths
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { matchPath } from '../utils/http.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type RouteParams = Record<string, string>;

export type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  params: RouteParams
) => void | Promise<void>;

interface ParamRouteEntry {
  method: HttpMethod;
  pattern: string;
  handler: RouteHandler;
}

const METHODS: readonly string[] = ['GET', 'POST', 'DELETE'];

function isHttpMethod(method: string | undefined): method is HttpMethod {
  return method !== undefined && METHODS.includes(method);
}

/**
 * Router that matches HTTP requests to handlers
 *
 * Exact paths are checked before parameterized ones.
 */
export class Router {
  private exactRoutes: Map<string, RouteHandler> = new Map();
  private paramRoutes: ParamRouteEntry[] = [];

  /**
   * Add a route with an exact path match
   * Example: router.add('GET', '/health', handler)
   */
  add(method: HttpMethod, path: string, handler: RouteHandler): void {
    this.exactRoutes.set(`${method}:${path}`, handler);
  }

  /**
   * Add a route with URL parameters
   * Example: router.addParam('GET', '/api/db/runs/:runId/periods', handler)
   */
  addParam(method: HttpMethod, pattern: string, handler: RouteHandler): void {
    this.paramRoutes.push({ method, pattern, handler });
  }

  /**
   * Attempt to handle a request
   * Returns false if no matching route was found (caller should 404)
   */
  handle(req: IncomingMessage, res: ServerResponse, pathname: string): boolean {
    const method = req.method;
    if (!isHttpMethod(method)) return false;

    const exactHandler = this.exactRoutes.get(`${method}:${pathname}`);
    if (exactHandler) {
      void Promise.resolve(exactHandler(req, res, {})).catch((error) => handlerFailed(res, error));
      return true;
    }

    for (const route of this.paramRoutes) {
      if (route.method !== method) continue;

      const params = matchPath(pathname, route.pattern);
      if (params) {
        void Promise.resolve(route.handler(req, res, params)).catch((error) =>
          handlerFailed(res, error)
        );
        return true;
      }
    }

    return false;
  }

  /**
   * Get stats about registered routes (for debugging)
   */
  getStats(): { exact: number; param: number } {
    return {
      exact: this.exactRoutes.size,
      param: this.paramRoutes.length,
    };
  }
}

function handlerFailed(res: ServerResponse, error: unknown): void {
  console.error('[Router] Handler failed:', error);
  if (!res.headersSent) {
    res.writeHead(500, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'Internal error' }));
  }
}
