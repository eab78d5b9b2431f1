/**
 * Environment configuration
 * Values come from the process environment, with .env.local loaded first
 */

import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });

// Unset, unparsable or non-positive means no limit
function parseOptionalLimit(value: string | undefined): number | null {
  if (!value) return null;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 1 ? null : parsed;
}

export const env = {
  PORT: parseInt(process.env.PORT || '3001', 10),
  SEED: parseInt(process.env.SEED || '12345', 10),
  MAX_PERIODS: parseOptionalLimit(process.env.MAX_PERIODS),
  FLUCTUATIONS: process.env.FLUCTUATIONS === 'true',
  DB_PATH: process.env.DB_PATH || 'tailorshop.db',
  DB_ENABLED: process.env.DB_ENABLED !== 'false',
};
