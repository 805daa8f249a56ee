import * as dotenv from 'dotenv';
import path from 'path';

// Load environment variables from .env file
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export interface ConverterConfig {
  // Site root used to build mention links, e.g. https://example.atlassian.net
  baseUrl: string | null;
  trackWarnings: boolean;
}

/**
 * Normalise a base URL: trailing slashes removed, anything that is not an
 * http(s) URL rejected.
 */
export function normalizeBaseUrl(value?: string | null): string | null {
  const trimmed = (value || '').trim().replace(/\/+$/, '');
  if (!trimmed) {
    return null;
  }
  if (!/^https?:\/\/[^\s/]+/i.test(trimmed)) {
    console.warn(`Invalid base URL: ${trimmed}. Mentions will be written as plain text.`);
    return null;
  }
  return trimmed;
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

export function getConverterConfig(env: NodeJS.ProcessEnv = process.env): ConverterConfig {
  return {
    baseUrl: normalizeBaseUrl(env.ADFMD_BASE_URL || env.JIRA_BASE_URL),
    trackWarnings: parseFlag(env.ADFMD_TRACK_WARNINGS, true),
  };
}
