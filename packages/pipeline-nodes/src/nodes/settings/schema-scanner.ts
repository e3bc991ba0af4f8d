/**
 * Settings schema scanner
 *
 * Builds a settings node's input schema from its folder tree:
 *
 *   setting/order_list.txt          parameter names, one per line
 *   setting/<param>/config.json     {"<param>": {type, value, min, max, step, options}}
 *   setting/<param>/<entry>         implicit choices when no options are given
 *
 * A parameter that cannot be resolved turns into an error marker; the rest of
 * the schema is unaffected.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { z } from 'zod';
import type { JsonObject, JsonValue } from '@asset-pipeline/channel-bus';
import { JsonObjectSchema, JsonValueSchema, errorMessage } from '@asset-pipeline/channel-bus';
import type { InputSpec } from '../base-node.js';

export const ORDER_LIST_FILE = 'order_list.txt';
export const CONFIG_FILE = 'config.json';
export const CONFIG_ERROR_OPTION = 'config_error';

export type ParameterOutcome = 'resolved' | 'fallback' | 'error';

export interface ParameterResolution {
  name: string;
  outcome: ParameterOutcome;
  spec: InputSpec;
  /** Where the input came from */
  source: 'config' | 'folder' | 'default';
  reason?: string;
}

export interface ParameterSchema {
  settingDir: string;
  parameters: ParameterResolution[];
}

export type ConfigRead =
  | { kind: 'absent' }
  | { kind: 'parsed'; entry: JsonValue | undefined }
  | { kind: 'unreadable'; reason: string };

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function field(entry: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(entry, key) ? entry[key] : undefined;
}

function asText(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return 'none';
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function errorMarker(name: string, reason: string): ParameterResolution {
  return {
    name,
    outcome: 'error',
    spec: { type: 'COMBO', options: [CONFIG_ERROR_OPTION], default: CONFIG_ERROR_OPTION },
    source: 'config',
    reason,
  };
}

const OPTIONS_ERROR = 'options must be a list of strings';
const FLOAT_VALUE_ERROR = 'float value must be a number';
const INT_VALUE_ERROR = 'int value must be an integer';

const EntrySchema = z.object({
  type: z.string({ invalid_type_error: 'type must be a string' }).nullish(),
});

function bound(key: 'min' | 'max' | 'step', fallback: number) {
  return z.number({ invalid_type_error: `${key} must be a number` }).default(fallback);
}

const FloatEntrySchema = z.object({
  value: z.number({ required_error: FLOAT_VALUE_ERROR, invalid_type_error: FLOAT_VALUE_ERROR }),
  min: bound('min', 0),
  max: bound('max', 1),
  step: bound('step', 0.01),
});

const IntEntrySchema = z.object({
  value: z.number({ required_error: INT_VALUE_ERROR, invalid_type_error: INT_VALUE_ERROR }).int(INT_VALUE_ERROR),
  min: bound('min', 0),
  max: bound('max', 100),
  step: bound('step', 1),
});

const StringEntrySchema = z.object({
  value: JsonValueSchema.optional(),
});

// Without options the parameter folder's entries are offered
const ComboEntrySchema = z.object({
  value: JsonValueSchema.optional(),
  options: z.array(z.string({ invalid_type_error: OPTIONS_ERROR }), { invalid_type_error: OPTIONS_ERROR }).optional(),
});

function issueReason(name: string, error: z.ZodError): string {
  const issue = error.issues[0];
  if (issue === undefined || issue.path.length === 0) return `Entry for ${name} is not an object`;
  return issue.message;
}

function comboOrText(
  name: string,
  options: string[],
  value: JsonValue | undefined,
  source: ParameterResolution['source']
): ParameterResolution {
  if (options.length === 0) {
    return { name, outcome: 'fallback', spec: { type: 'STRING', default: asText(value) }, source: 'default' };
  }
  const preferred = typeof value === 'string' && options.includes(value) ? value : options[0];
  return { name, outcome: 'resolved', spec: { type: 'COMBO', options, default: preferred }, source };
}

/**
 * Decide one parameter's input from its config entry and folder contents
 */
export function resolveParameter(name: string, config: ConfigRead, subItems: string[]): ParameterResolution {
  if (config.kind === 'unreadable') {
    return errorMarker(name, config.reason);
  }

  if (config.kind === 'absent') {
    return comboOrText(name, subItems, undefined, 'folder');
  }

  const entry = config.entry ?? {};
  const header = EntrySchema.safeParse(entry);
  if (!header.success) {
    return errorMarker(name, issueReason(name, header.error));
  }

  switch (header.data.type ?? 'combo') {
    case 'float': {
      const parsed = FloatEntrySchema.safeParse(entry);
      if (!parsed.success) return errorMarker(name, issueReason(name, parsed.error));
      const { value, ...bounds } = parsed.data;
      return { name, outcome: 'resolved', spec: { type: 'FLOAT', default: value, ...bounds }, source: 'config' };
    }
    case 'int': {
      const parsed = IntEntrySchema.safeParse(entry);
      if (!parsed.success) return errorMarker(name, issueReason(name, parsed.error));
      const { value, ...bounds } = parsed.data;
      return { name, outcome: 'resolved', spec: { type: 'INT', default: value, ...bounds }, source: 'config' };
    }
    case 'string': {
      const parsed = StringEntrySchema.safeParse(entry);
      if (!parsed.success) return errorMarker(name, issueReason(name, parsed.error));
      return { name, outcome: 'resolved', spec: { type: 'STRING', default: asText(parsed.data.value) }, source: 'config' };
    }
    default: {
      const parsed = ComboEntrySchema.safeParse(entry);
      if (!parsed.success) return errorMarker(name, issueReason(name, parsed.error));
      const { value, options } = parsed.data;
      return options === undefined
        ? comboOrText(name, subItems, value, 'folder')
        : comboOrText(name, options, value, 'config');
    }
  }
}

/**
 * Parameter names from order_list.txt (NFC, trimmed, blanks and repeats dropped)
 */
export async function readOrderList(settingDir: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(path.join(settingDir, ORDER_LIST_FILE), 'utf-8');
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }

  const names = content
    .split(/\r?\n/)
    .map((line) => line.trim().normalize('NFC'))
    .filter((line) => line.length > 0);
  return [...new Set(names)];
}

/**
 * Entries of a parameter folder usable as choices (not .json or .txt, not hidden)
 */
export async function listOptionEntries(paramDir: string): Promise<string[]> {
  const entries = await glob('*', {
    cwd: paramDir,
    ignore: ['*.json', '*.txt'],
    withFileTypes: true,
  });
  return entries.map((entry) => entry.name).sort();
}

export async function readParameterConfig(paramDir: string, name: string): Promise<ConfigRead> {
  let content: string;
  try {
    content = await fs.readFile(path.join(paramDir, CONFIG_FILE), 'utf-8');
  } catch (error) {
    if (isMissing(error)) return { kind: 'absent' };
    return { kind: 'unreadable', reason: errorMessage(error) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return { kind: 'unreadable', reason: `Malformed ${CONFIG_FILE}: ${errorMessage(error)}` };
  }

  const config = JsonObjectSchema.safeParse(parsed);
  if (!config.success) {
    return { kind: 'unreadable', reason: `${CONFIG_FILE} must hold an object` };
  }
  return { kind: 'parsed', entry: field(config.data, name) };
}

/**
 * Scan a category's setting folder into an ordered parameter schema
 */
export async function scanSettings(settingDir: string): Promise<ParameterSchema> {
  const names = await readOrderList(settingDir);
  const parameters: ParameterResolution[] = [];

  for (const name of names) {
    const paramDir = path.join(settingDir, name);
    const subItems = await listOptionEntries(paramDir);
    const config = await readParameterConfig(paramDir, name);
    parameters.push(resolveParameter(name, config, subItems));
  }

  return { settingDir, parameters };
}
