/**
 * Settings infrastructure bootstrap
 *
 * Lays out <root>/<category>/setting/<preset>/config.json and order_list.txt
 * from the bundled presets. Existing folders and files are left alone.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { JsonObject } from '@asset-pipeline/channel-bus';
import { CATEGORY_KEYS, JsonObjectSchema, PipelineError, errorMessage, settingsLogger } from '@asset-pipeline/channel-bus';
import { CONFIG_FILE, ORDER_LIST_FILE } from './schema-scanner.js';

/** Category key → preset name → config entry */
export type SettingsPresets = Record<string, Record<string, JsonObject>>;

const DEFAULT_PRESETS_URL = new URL('../../../data/default-settings.json', import.meta.url);

export function settingDirFor(settingsRoot: string, categoryKey: string): string {
  return path.join(settingsRoot, categoryKey, 'setting');
}

const SettingsPresetsSchema: z.ZodType<SettingsPresets> = z.record(z.record(JsonObjectSchema));

export async function loadDefaultPresets(): Promise<SettingsPresets> {
  const content = await fs.readFile(DEFAULT_PRESETS_URL, 'utf-8');
  const parsed = SettingsPresetsSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    throw new PipelineError('INFRA_WRITE_FAILED', `Bundled presets are malformed: ${parsed.error.message}`);
  }
  return parsed.data;
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create missing preset folders and order lists; returns the paths written
 */
export async function initializeSettingsInfra(
  settingsRoot: string,
  presets?: SettingsPresets
): Promise<string[]> {
  const source = presets ?? (await loadDefaultPresets());
  const written: string[] = [];

  try {
    for (const category of CATEGORY_KEYS) {
      const settingDir = settingDirFor(settingsRoot, category);
      const categoryPresets = source[category] ?? {};
      await fs.mkdir(settingDir, { recursive: true });

      for (const [name, entry] of Object.entries(categoryPresets)) {
        const presetDir = path.join(settingDir, name);
        if (await exists(presetDir)) continue;

        await fs.mkdir(presetDir, { recursive: true });
        const configPath = path.join(presetDir, CONFIG_FILE);
        await fs.writeFile(configPath, JSON.stringify({ [name]: entry }, null, 4), 'utf-8');
        written.push(configPath);
      }

      const orderPath = path.join(settingDir, ORDER_LIST_FILE);
      if (!(await exists(orderPath))) {
        await fs.writeFile(orderPath, Object.keys(categoryPresets).join('\n'), 'utf-8');
        written.push(orderPath);
      }
    }
  } catch (error) {
    throw new PipelineError(
      'INFRA_WRITE_FAILED',
      `Could not lay out settings under ${settingsRoot}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  if (written.length > 0) {
    settingsLogger.info(`Initialized ${written.length} settings files under ${settingsRoot}`);
  }
  return written;
}
