import { readFileSync, readdirSync, existsSync } from 'node:fs';
import { join, basename } from 'node:path';
import { homedir } from 'node:os';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { PanelConfigSchema, type PanelConfig } from './schema.js';
import { SETTINGS_DIR } from './defaults.js';
import { makeLogger } from '../observability/logger.js';

const logger = makeLogger({ component: 'config-loader' });

export type PresetSource = 'project' | 'user' | 'builtin';

export interface PresetDir {
  dir: string;
  source: PresetSource;
}

export interface PresetSummary {
  name: string;
  description?: string;
  source: PresetSource;
}

/** Project-level config from .symposium/config.yaml */
export interface ProjectConfig {
  defaultModel?: string;
  defaultPreset?: string;
}

function userHome(): string {
  return process.env.HOME ?? process.env.USERPROFILE ?? homedir();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load project-level config from .symposium/config.yaml (cwd), then
 * ~/.symposium/config.yaml. Project-local overrides user-global.
 */
export function loadProjectConfig(
  candidates: string[] = [
    join(process.cwd(), SETTINGS_DIR, 'config.yaml'),
    join(userHome(), SETTINGS_DIR, 'config.yaml'),
  ],
): ProjectConfig {
  const merged: ProjectConfig = {};

  // Read lowest priority first so higher priority overwrites
  for (const filePath of [...candidates].reverse()) {
    if (!existsSync(filePath)) continue;
    let parsed: unknown;
    try {
      parsed = YAML.parse(readFileSync(filePath, 'utf-8'));
    } catch (err) {
      logger.warn({ filePath, err: err instanceof Error ? err.message : String(err) }, 'Skipping malformed config file');
      continue;
    }
    if (!isRecord(parsed)) continue;
    if (typeof parsed.defaultModel === 'string' && parsed.defaultModel) {
      merged.defaultModel = parsed.defaultModel;
    }
    if (typeof parsed.defaultPreset === 'string' && parsed.defaultPreset) {
      merged.defaultPreset = parsed.defaultPreset;
    }
  }

  return merged;
}

/**
 * Directories to search for presets, highest priority first:
 * 1. Project-local: ./.symposium/presets/
 * 2. User global:   ~/.symposium/presets/
 * 3. Builtin:       <package>/presets/
 */
export function getPresetDirs(): PresetDir[] {
  return [
    { dir: join(process.cwd(), SETTINGS_DIR, 'presets'), source: 'project' },
    { dir: join(userHome(), SETTINGS_DIR, 'presets'), source: 'user' },
    { dir: fileURLToPath(new URL('../../presets', import.meta.url)), source: 'builtin' },
  ];
}

/** Load and validate a preset by name, searching higher-priority directories first. */
export function loadPreset(name: string, dirs: PresetDir[] = getPresetDirs()): PanelConfig {
  for (const { dir } of dirs) {
    const filePath = join(dir, `${name}.yaml`);
    if (existsSync(filePath)) {
      const parsed: unknown = YAML.parse(readFileSync(filePath, 'utf-8'));
      return PanelConfigSchema.parse(parsed);
    }
  }
  throw new Error(`Preset "${name}" not found. Run "symposium presets" to see available presets.`);
}

/**
 * List presets from all directories. Higher-priority presets shadow
 * lower-priority ones with the same name.
 */
export function listPresets(dirs: PresetDir[] = getPresetDirs()): PresetSummary[] {
  const seen = new Set<string>();
  const presets: PresetSummary[] = [];

  for (const { dir, source } of dirs) {
    if (!existsSync(dir)) continue;
    const files = readdirSync(dir)
      .filter((f) => f.endsWith('.yaml'))
      .sort();

    for (const file of files) {
      const name = basename(file, '.yaml');
      if (seen.has(name)) continue;
      seen.add(name);

      let parsed: unknown;
      try {
        parsed = YAML.parse(readFileSync(join(dir, file), 'utf-8'));
      } catch (err) {
        logger.warn({ file, err: err instanceof Error ? err.message : String(err) }, 'Unreadable preset');
        presets.push({ name, source });
        continue;
      }

      const description = isRecord(parsed)
        ? [parsed.description, parsed.name].find((v): v is string => typeof v === 'string')
        : undefined;
      presets.push({ name, description: description ?? name, source });
    }
  }

  return presets;
}
