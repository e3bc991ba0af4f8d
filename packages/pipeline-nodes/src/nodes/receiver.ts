/**
 * Receiver / Slave Distributor
 *
 * Reads the latest record for a channel (or an archived record file) and
 * splits it back into the six category records, always in the fixed
 * category order. A channel with no usable data is the normal "nothing yet"
 * state: six empty records and a FAILED status, never an exception.
 */
import * as path from 'path';
import type {
  BusValue,
  CategoryKey,
  CategoryRecord,
  ChannelBus,
  JsonObject,
  MasterRecord,
} from '@asset-pipeline/channel-bus';
import { CATEGORY_KEYS, TransferStatus, busLogger, unpackBusValue } from '@asset-pipeline/channel-bus';
import { BaseNode } from './base-node.js';
import type { InputSchema, NodeMenuCategory, OutputType } from './base-node.js';
import { loadArchiveRecord } from '../archive/archive.js';
import type { ReceiverConfig } from '../config.js';

export const REFERENCE_MODES = ['Channel', 'Archive'] as const;
export type ReferenceMode = (typeof REFERENCE_MODES)[number];

/**
 * raw: category records exactly as published
 * merged: project info (root extended by the category key) under each populated record
 */
export type DecompositionMode = 'raw' | 'merged';

export type ReceiverInputs = {
  channel: string;
  reference_mode?: ReferenceMode;
  archive_file_path?: string;
  /** 0 = every category, 1-6 = only that one */
  category_filter?: number;
};

export type CategoryOutputs = Record<CategoryKey, CategoryRecord>;

export type ReceiverOutputs = CategoryOutputs & {
  project_info: JsonObject;
  status: TransferStatus;
  message: string;
};

export interface ReceiverOptions {
  bus: ChannelBus;
  config: ReceiverConfig;
  defaultChannel: string;
  defaultArchivePath?: string;
}

export function emptyCategories(): CategoryOutputs {
  return {
    '01_Background': {},
    '02_Equipment': {},
    '03_Character': {},
    '04_Structure': {},
    '05_SpecialEffects': {},
    '06_Audio': {},
  };
}

/**
 * Split a master record into the six category records
 */
export function decomposeRecord(
  record: MasterRecord,
  mode: DecompositionMode,
  categoryFilter = 0
): CategoryOutputs {
  const outputs = emptyCategories();
  const { project_info: projectInfo, settings } = record;

  CATEGORY_KEYS.forEach((key, index) => {
    if (categoryFilter !== 0 && categoryFilter !== index + 1) return;

    const categoryRecord = settings[key];
    if (!categoryRecord) return;

    outputs[key] = structuredClone(
      mode === 'merged'
        ? { ...projectInfo, root: path.join(projectInfo.root, key), ...categoryRecord }
        : categoryRecord
    );
  });

  return outputs;
}

abstract class ChannelReaderNode extends BaseNode<ReceiverInputs, ReceiverOutputs> {
  readonly category: NodeMenuCategory = 'Universal_Pipeline/Distributed_Control';
  readonly returnTypes: readonly OutputType[] = ['DICT', 'DICT', 'DICT', 'DICT', 'DICT', 'DICT', 'DICT', 'STRING', 'STRING'];
  readonly returnNames = [...CATEGORY_KEYS, 'project_info', 'status', 'message'] as const;

  protected abstract readonly decomposition: DecompositionMode;

  private bus: ChannelBus;
  private config: ReceiverConfig;
  private defaultChannel: string;
  private defaultArchivePath: string;

  constructor(options: ReceiverOptions) {
    super();
    this.bus = options.bus;
    this.config = options.config;
    this.defaultChannel = options.defaultChannel;
    this.defaultArchivePath =
      options.defaultArchivePath ?? 'output/Archive_Data/archive_dictionary/filename.json';
  }

  async inputTypes(): Promise<InputSchema> {
    return {
      required: {
        channel: { type: 'STRING', default: this.defaultChannel },
        reference_mode: { type: 'COMBO', options: [...REFERENCE_MODES], default: 'Channel' },
        archive_file_path: { type: 'STRING', default: this.defaultArchivePath },
      },
      optional: {
        category_filter: { type: 'INT', default: 0, min: 0, max: CATEGORY_KEYS.length, step: 1 },
      },
    };
  }

  protected async executeImpl(inputs: ReceiverInputs): Promise<ReceiverOutputs> {
    const channel = inputs.channel.trim();
    const categoryFilter = inputs.category_filter ?? 0;

    if (!Number.isInteger(categoryFilter) || categoryFilter < 0 || categoryFilter > CATEGORY_KEYS.length) {
      return this.failure(`category_filter must be between 0 and ${CATEGORY_KEYS.length}`);
    }

    let value: BusValue | null = null;
    let source = '';

    if (inputs.reference_mode === 'Archive') {
      const archivePath = inputs.archive_file_path ?? '';
      const loaded = await loadArchiveRecord(archivePath);
      if (loaded.status === 'loaded') {
        value = loaded.value;
        source = `archive '${archivePath}'`;
      } else if (loaded.status === 'missing') {
        busLogger.warn(`Archive file ${archivePath} not found, reading channel '${channel}' instead`);
      } else {
        busLogger.warn(`Archive file ${archivePath} unusable, reading channel '${channel}' instead`, loaded.reason);
      }
    }

    if (!value) {
      if (channel.length === 0) {
        return this.failure('channel must be a non-empty string');
      }
      value = await this.bus.get(channel);
      source = `channel '${channel}'`;
    }

    if (!value) {
      return this.failure(`No data on channel '${channel}'. Has a master controller or sender run?`);
    }

    const unpacked = unpackBusValue(value, { verifyChecksum: this.config.verifyChecksum });
    if (!unpacked.ok) {
      busLogger.warn(unpacked.reason);
      return this.failure(unpacked.reason);
    }

    const categories = decomposeRecord(unpacked.record, this.decomposition, categoryFilter);
    const populated = CATEGORY_KEYS.filter((key) => Object.keys(categories[key]).length > 0).length;

    return {
      ...categories,
      project_info: structuredClone(unpacked.record.project_info),
      status: TransferStatus.SUCCESS,
      message: `Received ${populated} of ${CATEGORY_KEYS.length} categories from ${source}`,
    };
  }

  private failure(message: string): ReceiverOutputs {
    return {
      ...emptyCategories(),
      project_info: {},
      status: TransferStatus.FAILED,
      message,
    };
  }
}

/**
 * Category records exactly as they were aggregated
 */
export class ReceiverNode extends ChannelReaderNode {
  readonly nodeType = 'ReceiverNode';
  readonly displayName = 'Receiver Node (Channel-based)';
  protected readonly decomposition: DecompositionMode = 'raw';
}

/**
 * Category records carrying the project info, each rooted in its own folder
 */
export class SlaveDistributor extends ChannelReaderNode {
  readonly nodeType = 'SlaveDistributor';
  readonly displayName = '[SLAVE] Asset Distributor';
  protected readonly decomposition: DecompositionMode = 'merged';
}
