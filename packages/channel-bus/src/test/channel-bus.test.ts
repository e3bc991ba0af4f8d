/**
 * Channel Bus Unit Tests
 */
import { describe, it, expect } from 'vitest';
import { ChannelBus } from '../bus/channel-bus.js';
import { MemoryTransport } from '../storage/memory.js';
import { PipelineError } from '../utils/errors.js';
import type { MasterRecord } from '../types/index.js';

function record(name: string, prompt = 'sunset'): MasterRecord {
  return {
    project_info: { name, root: `/assets/${name}`, timestamp: '20240101_120000' },
    settings: { '01_Background': { prompt } },
  };
}

describe('ChannelBus', () => {
  it('returns what was set until the next set', async () => {
    const bus = new ChannelBus();
    const first = record('DEMO');

    await bus.set('MASTER_CH', first);
    expect(await bus.get('MASTER_CH')).toEqual(first);
    expect(await bus.get('MASTER_CH')).toEqual(first);
  });

  it('hands out copies, never the stored object', async () => {
    const bus = new ChannelBus();
    const first = record('DEMO');
    await bus.set('MASTER_CH', first);

    first.settings['01_Background'].prompt = 'changed by the writer';
    const read = await bus.get('MASTER_CH');
    expect(read).not.toBe(first);
    if (read === null || !('settings' in read)) throw new Error('expected a master record');
    read.settings['01_Background'].prompt = 'changed by a reader';

    expect(await bus.get('MASTER_CH')).toEqual(record('DEMO'));
  });

  it('keeps the last write', async () => {
    const bus = new ChannelBus();
    await bus.set('MASTER_CH', record('A'));
    await bus.set('MASTER_CH', record('B'));

    expect(await bus.get('MASTER_CH')).toEqual(record('B'));
  });

  it('keeps the last issued write when writers overlap', async () => {
    const bus = new ChannelBus();
    const writes = Array.from({ length: 50 }, (_, i) => bus.set('MASTER_CH', record(`P${i}`)));
    const reads = Array.from({ length: 10 }, () => bus.get('MASTER_CH'));

    await Promise.all([...writes, ...reads]);

    expect(await bus.get('MASTER_CH')).toEqual(record('P49'));
  });

  it('returns null for a channel that was never set', async () => {
    const bus = new ChannelBus();
    expect(await bus.get('NEVER_SET')).toBeNull();
  });

  it('keeps channels independent', async () => {
    const bus = new ChannelBus();
    await bus.set('A', record('one'));
    await bus.set('B', record('two'));

    expect(await bus.get('A')).toEqual(record('one'));
    expect(await bus.get('B')).toEqual(record('two'));
    expect((await bus.channels()).sort()).toEqual(['A', 'B']);
  });

  it('rejects a blank channel name', async () => {
    const bus = new ChannelBus();
    await expect(bus.set('  ', record('DEMO'))).rejects.toBeInstanceOf(PipelineError);
    await expect(bus.get('')).rejects.toThrow('Channel name cannot be empty');
  });

  it('reports its transport kind', () => {
    const transport = new MemoryTransport();
    const bus = new ChannelBus(transport);
    expect(bus.transportKind).toBe('memory');
  });
});
