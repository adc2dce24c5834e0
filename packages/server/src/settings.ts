import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import type { Settings } from '@filework/shared';

const SettingsSchema = z.object({
  defaultPath: z.string().nullable().optional().default(null),
  server: z
    .object({
      host: z.string().optional().default('127.0.0.1'),
      port: z.number().int().min(0).max(65535).optional().default(3850),
    })
    .optional()
    .default({ host: '127.0.0.1', port: 3850 }),
  watch: z
    .object({
      debounceMs: z.number().int().positive().optional().default(300),
    })
    .optional()
    .default({ debounceMs: 300 }),
  search: z
    .object({
      caseSensitive: z.boolean().optional().default(true),
    })
    .optional()
    .default({ caseSensitive: true }),
});

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

function getDefaultSettingsPath(): string {
  // config/settings.yaml at the repository root
  return fileURLToPath(new URL('../../../config/settings.yaml', import.meta.url));
}

export function getConfigDir(): string {
  return process.env.FILEWORK_CONFIG_DIR ?? join(homedir(), '.config', 'filework');
}

function getSettingsPath(): string {
  return join(getConfigDir(), 'settings.yaml');
}

export function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return resolve(path);
}

export function parseSettings(input: unknown): Settings {
  const settings = SettingsSchema.parse(input ?? {});
  return {
    ...settings,
    defaultPath: settings.defaultPath ? expandPath(settings.defaultPath) : null,
  };
}

function loadDefaultSettings(): Settings {
  const defaultPath = getDefaultSettingsPath();
  if (existsSync(defaultPath)) {
    try {
      return parseSettings(parse(readFileSync(defaultPath, 'utf-8')));
    } catch (error) {
      console.error('[settings] Error loading default settings:', error);
    }
  }
  return DEFAULT_SETTINGS;
}

export function loadSettings(): Settings {
  const settingsPath = getSettingsPath();

  if (!existsSync(settingsPath)) {
    const defaults = loadDefaultSettings();
    mkdirSync(getConfigDir(), { recursive: true });
    writeFileSync(settingsPath, stringify(defaults), 'utf-8');
    console.log(`[settings] Created default settings at ${settingsPath}`);
    return defaults;
  }

  try {
    return parseSettings(parse(readFileSync(settingsPath, 'utf-8')));
  } catch (error) {
    console.error('[settings] Error loading settings, using defaults:', error);
    return loadDefaultSettings();
  }
}

export function saveSettings(input: unknown): Settings {
  const settings = parseSettings(input);
  mkdirSync(getConfigDir(), { recursive: true });
  writeFileSync(getSettingsPath(), stringify(settings), 'utf-8');
  return settings;
}

export function resolveStartPath(settings: Settings): string {
  return settings.defaultPath ?? homedir();
}
