/**
 * Path and settings helpers
 */

import { homedir } from 'os';
import { join } from 'path';
import { existsSync, mkdirSync, readFileSync } from 'fs';
import type { PersonaSettings } from '../types';

/** Reddit Persona data directory */
export const PERSONA_DATA_DIR = join(homedir(), '.reddit-persona');

/** Rendered persona reports */
export const REPORTS_DIR = join(PERSONA_DATA_DIR, 'reports');

/** Settings file path */
export const SETTINGS_PATH = join(PERSONA_DATA_DIR, 'settings.json');

export const DEFAULT_BASE_URL = 'https://www.reddit.com';

export const DEFAULT_USER_AGENT = 'RedditPersona/0.1 (Node.js)';

const SETTING_KEYS: (keyof PersonaSettings)[] = ['REDDIT_USER_AGENT', 'REDDIT_BASE_URL'];

/**
 * Ensure directory exists
 */
export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Load settings from the settings file, with environment variables taking precedence
 */
export function loadSettings(
  settingsPath: string = SETTINGS_PATH,
  env: NodeJS.ProcessEnv = process.env
): PersonaSettings {
  const settings: PersonaSettings = {};

  if (existsSync(settingsPath)) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(settingsPath, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null) {
        for (const key of SETTING_KEYS) {
          const value: unknown = Reflect.get(parsed, key);
          if (typeof value === 'string' && value) {
            settings[key] = value;
          }
        }
      }
    } catch (error) {
      console.error(`Failed to read settings from ${settingsPath}:`, error);
    }
  }

  for (const key of SETTING_KEYS) {
    const value = env[key];
    if (value) {
      settings[key] = value;
    }
  }

  return settings;
}

/**
 * Format a date as YYYYMMDD_HHMMSS (local time)
 */
export function formatFileTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Whether epoch seconds fall inside the range Date can represent
 */
export function isValidEpoch(epochSeconds: number): boolean {
  return !Number.isNaN(new Date(epochSeconds * 1000).getTime());
}

/**
 * Format epoch seconds as "YYYY-MM-DD HH:MM:SS UTC", or "N/A" when out of range
 */
export function formatEpoch(epochSeconds: number): string {
  if (!isValidEpoch(epochSeconds)) {
    return 'N/A';
  }
  const d = new Date(epochSeconds * 1000);
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return (
    `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())} UTC`
  );
}

/**
 * Get persona report file path
 */
export function getPersonaReportPath(
  username: string,
  dir: string = REPORTS_DIR,
  date: Date = new Date()
): string {
  // Strip characters that are not safe in file names
  const safeName = username.replace(/[<>:"/\\|?*]/g, '_');
  return join(dir, `persona_${safeName}_${formatFileTimestamp(date)}.txt`);
}

/**
 * Extract a username from a profile URL or a bare name
 */
export function parseUsername(input: string): string {
  const segments = input
    .trim()
    .split(/[?#]/)[0]
    .split('/')
    .filter((segment) => segment.length > 0);

  const last = segments[segments.length - 1] || '';
  return last === 'u' || last === 'user' ? '' : last;
}
