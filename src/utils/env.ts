import fs from 'fs';
import path from 'path';
import { logger } from './logger';

let envLoaded = false;

/**
 * Parses `KEY=value` lines. Blank lines and `#` comments are skipped, and a
 * value wrapped in matching quotes is unwrapped.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const [key, ...rest] = trimmed.split('=');
    let value = rest.join('=').trim();
    if (value.length >= 2 && (value.startsWith('"') || value.startsWith("'")) && value.endsWith(value[0])) {
      value = value.slice(1, -1);
    }
    const name = key.trim();
    if (name) {
      entries[name] = value;
    }
  }
  return entries;
}

export function loadEnv(envFile = path.resolve(process.cwd(), '.env')) {
  if (envLoaded) {
    return;
  }

  if (fs.existsSync(envFile)) {
    const entries = parseEnvFile(fs.readFileSync(envFile, 'utf-8'));
    for (const [key, value] of Object.entries(entries)) {
      if (!(key in process.env)) {
        process.env[key] = value;
      }
    }
    logger.info('Environment variables loaded from .env');
  }

  envLoaded = true;
}
