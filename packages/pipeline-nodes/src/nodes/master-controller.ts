/**
 * Project Master Controller
 *
 * Merges the category records and the project identity into one master
 * record, archives it and publishes it to the bus.
 */
import * as path from 'path';
import type {
  CategoryKey,
  CategoryRecord,
  CategorySettings,
  ChannelBus,
  MasterRecord,
  ProjectInfo,
} from '@asset-pipeline/channel-bus';
import { CATEGORY_KEYS, TransferStatus, archiveLogger } from '@asset-pipeline/channel-bus';
import { BaseNode } from './base-node.js';
import type { InputSchema, InputSpec, NodeMenuCategory, OutputType } from './base-node.js';
import { archiveRecord, ensureCategoryFolders, formatTimestamp } from '../archive/archive.js';
import type { MasterConfig } from '../config.js';

export type MasterControllerInputs = {
  project_name: string;
  asset_save_root: string;
  archive_root: string;
  channel: string;
} & Partial<Record<CategoryKey, CategoryRecord>>;

export type MasterControllerOutputs = {
  merged_data: MasterRecord | null;
  archive_file: string;
  status: TransferStatus;
  message: string;
};

export interface MasterControllerOptions {
  bus: ChannelBus;
  defaults: MasterConfig;
  defaultChannel: string;
  /** Source of the record timestamp */
  clock?: () => Date;
}

export class ProjectMasterController extends BaseNode<MasterControllerInputs, MasterControllerOutputs> {
  readonly nodeType = 'ProjectMasterController';
  readonly displayName = 'Project Master Controller (Master)';
  readonly category: NodeMenuCategory = 'Universal_Pipeline/Management';
  readonly outputNode = true;
  readonly returnTypes: readonly OutputType[] = ['DICT', 'STRING', 'STRING', 'STRING'];
  readonly returnNames = ['merged_data', 'archive_file', 'status', 'message'] as const;

  private bus: ChannelBus;
  private defaults: MasterConfig;
  private defaultChannel: string;
  private clock: () => Date;

  constructor(options: MasterControllerOptions) {
    super();
    this.bus = options.bus;
    this.defaults = options.defaults;
    this.defaultChannel = options.defaultChannel;
    this.clock = options.clock ?? (() => new Date());
  }

  async inputTypes(): Promise<InputSchema> {
    const optional: Record<string, InputSpec> = {};
    for (const key of CATEGORY_KEYS) {
      optional[key] = { type: 'DICT' };
    }

    return {
      required: {
        project_name: { type: 'STRING', default: this.defaults.defaultProjectName },
        asset_save_root: { type: 'STRING', default: this.defaults.defaultAssetRoot },
        archive_root: { type: 'STRING', default: this.defaults.defaultArchiveRoot },
        channel: { type: 'STRING', default: this.defaultChannel },
      },
      optional,
    };
  }

  protected async executeImpl(inputs: MasterControllerInputs): Promise<MasterControllerOutputs> {
    const projectName = inputs.project_name.trim();
    const channel = inputs.channel.trim();

    const invalid = this.validate(projectName, channel);
    if (invalid) {
      archiveLogger.warn(invalid);
      return { merged_data: null, archive_file: '', status: TransferStatus.FAILED, message: invalid };
    }

    const timestamp = formatTimestamp(this.clock());
    const projectRoot = path.resolve(inputs.asset_save_root, projectName);

    const settings: CategorySettings = {};
    for (const key of CATEGORY_KEYS) {
      const record = inputs[key];
      if (record) {
        settings[key] = structuredClone(record);
      }
    }

    const projectInfo: ProjectInfo = { name: projectName, root: projectRoot, timestamp };
    Object.freeze(projectInfo);
    const record: MasterRecord = { project_info: projectInfo, settings };

    await ensureCategoryFolders(projectRoot);
    const archived = await archiveRecord(inputs.archive_root, record);
    await this.bus.set(channel, record);

    return {
      merged_data: record,
      archive_file: archived.path,
      status: TransferStatus.SUCCESS,
      message: `Published ${projectName} to '${channel}' (${Object.keys(settings).length} categories)`,
    };
  }

  private validate(projectName: string, channel: string): string | null {
    if (projectName.length === 0) {
      return 'project_name cannot be empty';
    }
    if (/[\\/]/.test(projectName) || projectName === '.' || projectName === '..') {
      return `project_name '${projectName}' must be a single folder name`;
    }
    if (channel.length === 0) {
      return 'channel cannot be empty';
    }
    return null;
  }
}
