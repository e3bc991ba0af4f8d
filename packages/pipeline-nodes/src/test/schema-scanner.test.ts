/**
 * Settings Schema Scanner Unit Tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  CONFIG_ERROR_OPTION,
  listOptionEntries,
  readOrderList,
  readParameterConfig,
  resolveParameter,
  scanSettings,
} from '../nodes/settings/schema-scanner.js';

const errorSpec = { type: 'COMBO', options: [CONFIG_ERROR_OPTION], default: CONFIG_ERROR_OPTION };

describe('resolveParameter', () => {
  it('offers folder entries when there is no config', () => {
    const result = resolveParameter('ckpt', { kind: 'absent' }, ['a.safetensors', 'b.safetensors']);

    expect(result).toEqual({
      name: 'ckpt',
      outcome: 'resolved',
      spec: { type: 'COMBO', options: ['a.safetensors', 'b.safetensors'], default: 'a.safetensors' },
      source: 'folder',
    });
  });

  it('falls back to a text input when there is nothing to choose from', () => {
    const result = resolveParameter('ckpt', { kind: 'absent' }, []);

    expect(result).toEqual({
      name: 'ckpt',
      outcome: 'fallback',
      spec: { type: 'STRING', default: 'none' },
      source: 'default',
    });
  });

  it('reads a float entry with partial bounds', () => {
    const result = resolveParameter('strength', { kind: 'parsed', entry: { type: 'float', value: 0.8, max: 2 } }, []);

    expect(result.spec).toEqual({ type: 'FLOAT', default: 0.8, min: 0, max: 2, step: 0.01 });
    expect(result.source).toBe('config');
  });

  it('reads an int entry with its defaults', () => {
    const result = resolveParameter('fps', { kind: 'parsed', entry: { type: 'int', value: 12 } }, []);
    expect(result.spec).toEqual({ type: 'INT', default: 12, min: 0, max: 100, step: 1 });
  });

  it('rejects an int entry holding a fraction', () => {
    const result = resolveParameter('fps', { kind: 'parsed', entry: { type: 'int', value: 1.5 } }, []);

    expect(result.outcome).toBe('error');
    expect(result.spec).toEqual(errorSpec);
    expect(result.reason).toBe('int value must be an integer');
  });

  it('rejects a non-numeric bound', () => {
    const result = resolveParameter('strength', { kind: 'parsed', entry: { type: 'float', value: 1, min: 'low' } }, []);
    expect(result.reason).toBe('min must be a number');
  });

  it('writes a null string value as none', () => {
    const result = resolveParameter('prompt', { kind: 'parsed', entry: { type: 'string', value: null } }, []);
    expect(result.spec).toEqual({ type: 'STRING', default: 'none' });
  });

  it('prefers the configured value when it is one of the options', () => {
    const entry = { type: 'combo', value: '4:3', options: ['16:9', '4:3'] };
    expect(resolveParameter('ratio', { kind: 'parsed', entry }, ['ignored']).spec).toEqual({
      type: 'COMBO',
      options: ['16:9', '4:3'],
      default: '4:3',
    });
  });

  it('falls back to the first option for an unknown value', () => {
    const entry = { value: 'square', options: ['16:9', '4:3'] };
    expect(resolveParameter('ratio', { kind: 'parsed', entry }, []).spec).toEqual({
      type: 'COMBO',
      options: ['16:9', '4:3'],
      default: '16:9',
    });
  });

  it('uses folder entries for a combo without options', () => {
    const entry = { type: 'combo', value: 'b.ckpt' };
    const result = resolveParameter('model', { kind: 'parsed', entry }, ['a.ckpt', 'b.ckpt']);

    expect(result.spec).toEqual({ type: 'COMBO', options: ['a.ckpt', 'b.ckpt'], default: 'b.ckpt' });
    expect(result.source).toBe('folder');
  });

  it('treats a config without this parameter as an empty entry', () => {
    const result = resolveParameter('model', { kind: 'parsed', entry: undefined }, ['x.ckpt']);
    expect(result.spec).toEqual({ type: 'COMBO', options: ['x.ckpt'], default: 'x.ckpt' });
  });

  it('marks options that are not all strings', () => {
    const result = resolveParameter('ratio', { kind: 'parsed', entry: { options: ['16:9', 4] } }, []);
    expect(result).toEqual({
      name: 'ratio',
      outcome: 'error',
      spec: errorSpec,
      source: 'config',
      reason: 'options must be a list of strings',
    });
  });

  it.each([
    [{ type: 7 }, 'type must be a string'],
    [{ type: 'float' }, 'float value must be a number'],
    [{ type: 'float', value: '0.5' }, 'float value must be a number'],
    [{ type: 'int', value: 'ten' }, 'int value must be an integer'],
    [{ type: 'int', value: 5, step: null }, 'step must be a number'],
    [{ options: '16:9' }, 'options must be a list of strings'],
  ])('marks the entry %j', (entry, reason) => {
    const result = resolveParameter('ratio', { kind: 'parsed', entry }, []);

    expect(result.outcome).toBe('error');
    expect(result.reason).toBe(reason);
  });

  it('reads a null type as a combo', () => {
    const result = resolveParameter('ratio', { kind: 'parsed', entry: { type: null, options: ['16:9'] } }, []);
    expect(result.spec).toEqual({ type: 'COMBO', options: ['16:9'], default: '16:9' });
  });

  it('ignores bounds on a text entry', () => {
    const result = resolveParameter('prompt', { kind: 'parsed', entry: { type: 'string', value: 'dusk', min: 'x' } }, []);
    expect(result.spec).toEqual({ type: 'STRING', default: 'dusk' });
  });

  it('marks an entry that is not an object', () => {
    const result = resolveParameter('ratio', { kind: 'parsed', entry: 5 }, []);
    expect(result.reason).toBe('Entry for ratio is not an object');
  });

  it('marks an unreadable config', () => {
    const result = resolveParameter('ratio', { kind: 'unreadable', reason: 'Malformed config.json' }, ['a']);
    expect(result.outcome).toBe('error');
    expect(result.reason).toBe('Malformed config.json');
  });
});

describe('settings folder scanning', () => {
  let settingDir: string;

  beforeEach(async () => {
    settingDir = await fs.mkdtemp(path.join(os.tmpdir(), 'setting-'));
  });

  afterEach(async () => {
    await fs.rm(settingDir, { recursive: true, force: true });
  });

  async function writeParam(name: string, files: Record<string, string>): Promise<void> {
    const dir = path.join(settingDir, name);
    await fs.mkdir(dir, { recursive: true });
    for (const [file, content] of Object.entries(files)) {
      await fs.writeFile(path.join(dir, file), content, 'utf-8');
    }
  }

  it('reads the order list trimmed, normalized and without repeats', async () => {
    await fs.writeFile(path.join(settingDir, 'order_list.txt'), ' ckpt \r\n\nCafe\u0301\nckpt\n', 'utf-8');
    expect(await readOrderList(settingDir)).toEqual(['ckpt', 'Caf\u00e9']);
  });

  it('reads a missing order list as no parameters', async () => {
    expect(await readOrderList(settingDir)).toEqual([]);
    expect(await scanSettings(settingDir)).toEqual({ settingDir, parameters: [] });
  });

  it('lists choices without json, txt or hidden entries', async () => {
    await writeParam('ckpt', {
      'b.safetensors': '',
      'a.safetensors': '',
      'config.json': '{}',
      'notes.txt': '',
      '.hidden': '',
    });
    await fs.mkdir(path.join(settingDir, 'ckpt', 'variants'));

    expect(await listOptionEntries(path.join(settingDir, 'ckpt'))).toEqual([
      'a.safetensors',
      'b.safetensors',
      'variants',
    ]);
  });

  it('reports a malformed config as unreadable', async () => {
    await writeParam('ckpt', { 'config.json': '{not json' });

    const config = await readParameterConfig(path.join(settingDir, 'ckpt'), 'ckpt');
    expect(config.kind).toBe('unreadable');
  });

  it('reports a config that is not an object as unreadable', async () => {
    await writeParam('ckpt', { 'config.json': '["a", "b"]' });

    expect(await readParameterConfig(path.join(settingDir, 'ckpt'), 'ckpt')).toEqual({
      kind: 'unreadable',
      reason: 'config.json must hold an object',
    });
  });

  it('scans every listed parameter in order', async () => {
    await fs.writeFile(path.join(settingDir, 'order_list.txt'), 'strength\nckpt\nbroken\nprompt', 'utf-8');
    await writeParam('strength', {
      'config.json': JSON.stringify({ strength: { type: 'float', value: 0.5, min: 0, max: 2, step: 0.1 } }),
    });
    await writeParam('ckpt', {
      'a.safetensors': '',
      'b.safetensors': '',
      'config.json': JSON.stringify({ ckpt: { type: 'combo', value: 'b.safetensors' } }),
    });
    await writeParam('broken', { 'config.json': '[' });

    const schema = await scanSettings(settingDir);

    expect(schema.parameters.map((parameter) => parameter.name)).toEqual(['strength', 'ckpt', 'broken', 'prompt']);
    expect(schema.parameters.map((parameter) => parameter.spec)).toEqual([
      { type: 'FLOAT', default: 0.5, min: 0, max: 2, step: 0.1 },
      { type: 'COMBO', options: ['a.safetensors', 'b.safetensors'], default: 'b.safetensors' },
      errorSpec,
      { type: 'STRING', default: 'none' },
    ]);
  });
});
