/**
 * Runtime configuration from environment (.env via dotenv)
 */

import dotenv from 'dotenv';
import { ExplosionLimits, RootPolicy } from './types';
import { DEFAULT_EXPLOSION_LIMITS, DEFAULT_ROOT_POLICY, ROOT_POLICIES } from './constants';

dotenv.config();

export interface SupabaseCredentials {
  url: string;
  anonKey: string;
}

// Values shipped in .env.example
const PLACEHOLDER_CREDENTIALS: SupabaseCredentials = {
  url: 'your_supabase_url_here',
  anonKey: 'your_supabase_anon_key_here'
};

export interface BomConfig {
  limits: ExplosionLimits;
  rootPolicy: RootPolicy;
}

function positiveInt(value: unknown): number | undefined {
  const n = typeof value === 'string' ? Number(value.trim()) : value;
  return typeof n === 'number' && Number.isInteger(n) && n > 0 ? n : undefined;
}

export function isRootPolicy(value: unknown): value is RootPolicy {
  return typeof value === 'string' && ROOT_POLICIES.some(p => p === value);
}

/**
 * Overlay valid positive integers from overrides onto base; anything else is ignored
 */
export function mergeExplosionLimits(
  base: ExplosionLimits,
  overrides: Partial<Record<keyof ExplosionLimits, unknown>> = {}
): ExplosionLimits {
  return {
    maxDepth: positiveInt(overrides.maxDepth) ?? base.maxDepth,
    maxPaths: positiveInt(overrides.maxPaths) ?? base.maxPaths
  };
}

export function loadBomConfig(env: NodeJS.ProcessEnv = process.env): BomConfig {
  return {
    limits: mergeExplosionLimits(DEFAULT_EXPLOSION_LIMITS, {
      maxDepth: env.BOM_MAX_DEPTH,
      maxPaths: env.BOM_MAX_PATHS
    }),
    rootPolicy: isRootPolicy(env.BOM_ROOT_POLICY) ? env.BOM_ROOT_POLICY : DEFAULT_ROOT_POLICY
  };
}

/**
 * Supabase credentials for the BOM store, or null when unset or still the .env.example placeholders
 */
export function readSupabaseCredentials(env: NodeJS.ProcessEnv = process.env): SupabaseCredentials | null {
  const url = env.SUPABASE_URL?.trim();
  const anonKey = env.SUPABASE_ANON_KEY?.trim();
  if (!url || !anonKey) return null;
  if (url === PLACEHOLDER_CREDENTIALS.url || anonKey === PLACEHOLDER_CREDENTIALS.anonKey) return null;
  return { url, anonKey };
}
