/**
 * Project Master Controller Unit Tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ChannelBus, TransferStatus } from '@asset-pipeline/channel-bus';
import { ProjectMasterController } from '../nodes/master-controller.js';
import { SlaveDistributor } from '../nodes/receiver.js';
import type { MasterControllerInputs } from '../nodes/master-controller.js';
import type { TelemetryEvent } from '../nodes/base-node.js';
import { DEFAULT_CONFIG } from '../config.js';
import { readArchiveIndex } from '../archive/archive.js';

const fixedClock = () => new Date(2024, 0, 2, 3, 4, 5);

describe('ProjectMasterController', () => {
  let tmp: string;
  let bus: ChannelBus;
  let controller: ProjectMasterController;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'master-'));
    bus = new ChannelBus();
    controller = new ProjectMasterController({
      bus,
      defaults: DEFAULT_CONFIG.master,
      defaultChannel: 'MASTER_CH',
      clock: fixedClock,
    });
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  function inputs(overrides: Partial<MasterControllerInputs> = {}): MasterControllerInputs {
    return {
      project_name: 'DEMO',
      asset_save_root: path.join(tmp, 'Asset_Library'),
      archive_root: path.join(tmp, 'Archive_Data'),
      channel: 'MASTER_CH',
      '01_Background': { prompt: 'sunset' },
      '03_Character': { denoise: 0.6 },
      ...overrides,
    };
  }

  it('declares its sockets', async () => {
    const schema = await controller.inputTypes();

    expect(controller.outputNode).toBe(true);
    expect(controller.returnNames).toEqual(['merged_data', 'archive_file', 'status', 'message']);
    expect(schema.required.project_name).toEqual({ type: 'STRING', default: 'PIPELINE_PROJ' });
    expect(schema.required.channel).toEqual({ type: 'STRING', default: 'MASTER_CH' });
    expect(Object.keys(schema.optional ?? {})).toHaveLength(6);
  });

  it('aggregates, archives and publishes a project', async () => {
    const result = await controller.execute(inputs());
    const projectRoot = path.join(tmp, 'Asset_Library', 'DEMO');
    const expected = {
      project_info: { name: 'DEMO', root: projectRoot, timestamp: '20240102_030405' },
      settings: {
        '01_Background': { prompt: 'sunset' },
        '03_Character': { denoise: 0.6 },
      },
    };

    expect(result).toEqual({
      merged_data: expected,
      archive_file: path.join(tmp, 'Archive_Data', 'archive_dictionary', '20240102_030405_DEMO.json'),
      status: TransferStatus.SUCCESS,
      message: "Published DEMO to 'MASTER_CH' (2 categories)",
    });

    expect(await bus.get('MASTER_CH')).toEqual(expected);

    const archived = await fs.readFile(result.archive_file, 'utf-8');
    expect(JSON.parse(archived)).toEqual(expected);
    expect(await readArchiveIndex(path.join(tmp, 'Archive_Data'))).toEqual([
      { timestamp: '20240102_030405', project: 'DEMO', file: '20240102_030405_DEMO.json' },
    ]);

    const folders = await fs.readdir(projectRoot);
    expect(folders).toHaveLength(6);
  });

  it('hands a background-only project to the slave distributor', async () => {
    await controller.execute({
      project_name: 'DEMO',
      asset_save_root: path.join(tmp, 'Asset_Library'),
      archive_root: path.join(tmp, 'Archive_Data'),
      channel: 'MASTER_CH',
      '01_Background': { prompt: 'sunset' },
    });

    const slave = new SlaveDistributor({ bus, config: { verifyChecksum: true }, defaultChannel: 'MASTER_CH' });
    const tuple = slave.toTuple(await slave.execute({ channel: 'MASTER_CH' }));

    expect(tuple.slice(0, 6)).toEqual([
      {
        name: 'DEMO',
        root: path.join(tmp, 'Asset_Library', 'DEMO', '01_Background'),
        timestamp: '20240102_030405',
        prompt: 'sunset',
      },
      {},
      {},
      {},
      {},
      {},
    ]);
  });

  it('publishes copies of the upstream category records', async () => {
    const background = { prompt: 'sunset' };
    const result = await controller.execute(inputs({ '01_Background': background }));

    background.prompt = 'storm';
    expect(result.merged_data?.settings['01_Background']).toEqual({ prompt: 'sunset' });

    if (!result.merged_data) throw new Error('expected merged data');
    result.merged_data.settings['03_Character'].denoise = 0.1;
    expect(await bus.get('MASTER_CH')).toMatchObject({
      settings: { '01_Background': { prompt: 'sunset' }, '03_Character': { denoise: 0.6 } },
    });
  });

  it('omits categories that were not connected', async () => {
    const result = await controller.execute({
      project_name: 'EMPTY',
      asset_save_root: path.join(tmp, 'Asset_Library'),
      archive_root: path.join(tmp, 'Archive_Data'),
      channel: 'MASTER_CH',
    });

    expect(result.status).toBe(TransferStatus.SUCCESS);
    expect(result.merged_data?.settings).toEqual({});
    expect(result.message).toBe("Published EMPTY to 'MASTER_CH' (0 categories)");
  });

  it('archives every run, even within the same second', async () => {
    for (let i = 0; i < 3; i++) {
      await controller.execute(inputs());
    }

    const entries = await readArchiveIndex(path.join(tmp, 'Archive_Data'));
    expect(entries.map((entry) => entry.file)).toEqual([
      '20240102_030405_DEMO.json',
      '20240102_030405_DEMO_1.json',
      '20240102_030405_DEMO_2.json',
    ]);
    const files = await fs.readdir(path.join(tmp, 'Archive_Data', 'archive_dictionary'));
    expect(files).toHaveLength(3);
  });

  it('trims the project name and channel', async () => {
    const result = await controller.execute(inputs({ project_name: '  DEMO ', channel: ' PROJ_A ' }));

    expect(result.merged_data?.project_info.name).toBe('DEMO');
    expect(await bus.get('PROJ_A')).toEqual(result.merged_data);
  });

  it.each([
    ['   ', 'MASTER_CH', 'project_name cannot be empty'],
    ['a/b', 'MASTER_CH', "project_name 'a/b' must be a single folder name"],
    ['..', 'MASTER_CH', "project_name '..' must be a single folder name"],
    ['DEMO', '  ', 'channel cannot be empty'],
  ])('rejects project %j on channel %j', async (projectName, channel, message) => {
    const result = await controller.execute(inputs({ project_name: projectName, channel }));

    expect(result).toEqual({ merged_data: null, archive_file: '', status: TransferStatus.FAILED, message });
    expect(await bus.channels()).toEqual([]);
    expect(await readArchiveIndex(path.join(tmp, 'Archive_Data'))).toEqual([]);
  });

  it('raises when the archive cannot be written and publishes nothing', async () => {
    const blocker = path.join(tmp, 'not-a-dir');
    await fs.writeFile(blocker, '', 'utf-8');

    const errors: TelemetryEvent[] = [];
    controller.on('node:error', (event) => errors.push(event));

    await expect(controller.execute(inputs({ archive_root: blocker }))).rejects.toMatchObject({
      code: 'ARCHIVE_WRITE_FAILED',
    });
    expect(await bus.get('MASTER_CH')).toBeNull();
    expect(errors).toHaveLength(1);
    expect(errors[0].error?.code).toBe('ARCHIVE_WRITE_FAILED');
  });
});
