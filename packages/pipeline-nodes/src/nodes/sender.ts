/**
 * Sender Node
 *
 * Validates a master record, wraps it in an envelope with a checksum and
 * publishes the envelope to a channel. Whether the channel lives in memory or
 * in the cache directory depends on the bus transport.
 */
import type { ChannelBus, JsonValue, MasterRecord } from '@asset-pipeline/channel-bus';
import {
  TransferStatus,
  busLogger,
  errorMessage,
  normalizeMasterRecord,
  packEnvelope,
} from '@asset-pipeline/channel-bus';
import { BaseNode } from './base-node.js';
import type { InputSchema, NodeMenuCategory, OutputType } from './base-node.js';
import type { SenderConfig } from '../config.js';

export const SENDER_NAME = 'Sender Node';
export const SENDER_VERSION = '1.2';

export type SenderInputs = {
  master_data: unknown;
  channel: string;
};

export type SenderOutputs = {
  status: TransferStatus;
  message: string;
  /** Unix seconds */
  timestamp: number;
  checksum: string;
};

export interface SenderOptions {
  bus: ChannelBus;
  config: SenderConfig;
  defaultChannel: string;
}

type Validated = { ok: true; record: MasterRecord } | { ok: false; message: string };

export class SenderNode extends BaseNode<SenderInputs, SenderOutputs> {
  readonly nodeType = 'SenderNode';
  readonly displayName = 'Sender Node (Channel-based)';
  readonly category: NodeMenuCategory = 'Universal_Pipeline/Distributed_Control';
  readonly returnTypes: readonly OutputType[] = ['STRING', 'STRING', 'INT', 'STRING'];
  readonly returnNames = ['status', 'message', 'timestamp', 'checksum'] as const;

  private bus: ChannelBus;
  private config: SenderConfig;
  private defaultChannel: string;

  constructor(options: SenderOptions) {
    super();
    this.bus = options.bus;
    this.config = options.config;
    this.defaultChannel = options.defaultChannel;
  }

  get senderId(): string {
    return `${SENDER_NAME} v${SENDER_VERSION}`;
  }

  async inputTypes(): Promise<InputSchema> {
    return {
      required: {
        master_data: { type: 'DICT' },
        channel: { type: 'STRING', default: this.defaultChannel },
      },
    };
  }

  /**
   * Check shape, channel and size; returns the record as it will be sent
   */
  validateInputs(masterData: unknown, channel: string): Validated {
    if (typeof masterData !== 'object' || masterData === null || Array.isArray(masterData)) {
      return { ok: false, message: 'master_data must be an object' };
    }
    if (!('project_info' in masterData)) {
      return { ok: false, message: 'master_data has no project_info' };
    }
    if (!('settings' in masterData)) {
      return { ok: false, message: 'master_data has no settings' };
    }
    if (channel.trim().length === 0) {
      return { ok: false, message: 'channel must be a non-empty string' };
    }

    let serialized: string;
    try {
      serialized = JSON.stringify(masterData);
    } catch (error) {
      return { ok: false, message: `master_data cannot be serialized: ${errorMessage(error)}` };
    }

    const size = Buffer.byteLength(serialized, 'utf8');
    if (size > this.config.maxPayloadSize) {
      return { ok: false, message: `Payload too large: ${size} > ${this.config.maxPayloadSize} bytes` };
    }

    const parsed: JsonValue = JSON.parse(serialized);
    const record = normalizeMasterRecord(parsed);
    if (!record) {
      return { ok: false, message: 'master_data project_info and settings must be objects' };
    }
    return { ok: true, record };
  }

  protected async executeImpl(inputs: SenderInputs): Promise<SenderOutputs> {
    const channel = inputs.channel.trim();
    const validated = this.validateInputs(inputs.master_data, inputs.channel);
    if (!validated.ok) {
      busLogger.warn(`Send rejected: ${validated.message}`);
      return {
        status: TransferStatus.FAILED,
        message: validated.message,
        timestamp: Math.floor(Date.now() / 1000),
        checksum: '',
      };
    }

    const envelope = packEnvelope(validated.record, {
      channel,
      sender: this.senderId,
      enableChecksum: this.config.enableChecksum,
      format: this.config.format,
    });
    const { timestamp, checksum } = envelope.metadata;

    try {
      await this.bus.set(channel, envelope);
    } catch (error) {
      const message = `Could not publish to '${channel}': ${errorMessage(error)}`;
      busLogger.error(message);
      return { status: TransferStatus.FAILED, message, timestamp, checksum };
    }

    busLogger.info(`Sent ${validated.record.project_info.name} to '${channel}'`, {
      checksum: checksum.slice(0, 16),
    });
    return {
      status: TransferStatus.SUCCESS,
      message: `Sent to channel '${channel}'`,
      timestamp,
      checksum,
    };
  }
}
