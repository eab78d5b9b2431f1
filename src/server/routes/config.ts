/**
 * Config overrides routes
 */

import type { Router } from './router.js';
import { sendJson, sendError, parseJsonBody } from '../utils/http.js';
import {
  loadOverrides,
  addOverride,
  removeOverride,
  clearOverrides,
  getOverridesPath,
  applyOverridesToConfig,
} from '../../config/overrides.js';
import { DEFAULT_CONFIG } from '../../core/shop.js';
import { checkConfigValue } from '../../core/validation.js';
import { state } from '../state.js';

function readPath(obj: object, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, part);
  }
  return current;
}

export function registerConfigRoutes(router: Router): void {
  router.add('GET', '/api/config/overrides', (_req, res) => {
    sendJson(res, 200, {
      ...loadOverrides(),
      filePath: getOverridesPath(),
    });
  });

  router.add('DELETE', '/api/config/overrides', (_req, res) => {
    if (clearOverrides()) {
      sendJson(res, 200, {
        success: true,
        message: 'All config overrides cleared. Reset the simulation to apply default config.',
      });
    } else {
      sendError(res, 500, 'Failed to clear overrides');
    }
  });

  // Add or replace an override; takes effect on the next reset
  router.add('POST', '/api/config/overrides', async (req, res) => {
    const body = await parseJsonBody(req);
    if (typeof body !== 'object' || body === null) {
      sendError(res, 400, 'Invalid JSON body');
      return;
    }

    const path: unknown = Reflect.get(body, 'path');
    const source: unknown = Reflect.get(body, 'source');
    const rationale: unknown = Reflect.get(body, 'rationale');
    if (typeof path !== 'string' || path === '' || !Reflect.has(body, 'newValue')) {
      sendError(res, 400, 'path and newValue are required');
      return;
    }

    const newValue: unknown = Reflect.get(body, 'newValue');
    const current = state.simulation ? state.simulation.getConfig() : DEFAULT_CONFIG;
    const candidate = applyOverridesToConfig(current, {
      version: 1,
      lastModified: new Date().toISOString(),
      overrides: [{ path, oldValue: null, newValue, appliedAt: new Date().toISOString(), source: 'api' }],
    });
    const oldValue = readPath(current, path);
    if (readPath(candidate, path) !== newValue) {
      const reason = checkConfigValue(path, newValue);
      sendError(res, 400, reason ?? `Cannot set ${path} to ${JSON.stringify(newValue)}`);
      return;
    }

    const success = addOverride({
      path,
      oldValue,
      newValue,
      source: typeof source === 'string' ? source : 'api',
      ...(typeof rationale === 'string' ? { rationale } : {}),
    });
    if (success) {
      sendJson(res, 200, {
        success: true,
        message: `Override for ${path} saved. Reset the simulation to apply.`,
      });
    } else {
      sendError(res, 500, 'Failed to save override');
    }
  });

  // Remove a specific override
  router.add('POST', '/api/config/overrides/remove', async (req, res) => {
    const body = await parseJsonBody(req);
    const path: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'path') : undefined;
    if (typeof path !== 'string' || path === '') {
      sendError(res, 400, 'path is required');
      return;
    }

    const success = removeOverride(path);
    sendJson(res, 200, {
      success,
      message: success
        ? `Override for ${path} removed. Reset the simulation to apply.`
        : `No override found for ${path}`,
    });
  });
}
