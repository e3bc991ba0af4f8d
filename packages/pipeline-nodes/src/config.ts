/**
 * Pipeline configuration
 */
import type { EnvelopeFormat, LogLevel, TransportKind } from '@asset-pipeline/channel-bus';
import { getGlobalLogLevel } from '@asset-pipeline/channel-bus';

export interface SenderConfig {
  /** Largest serialized payload accepted, in bytes */
  maxPayloadSize: number;
  enableChecksum: boolean;
  format: EnvelopeFormat;
}

export interface ReceiverConfig {
  /** Reject envelopes whose recomputed checksum differs */
  verifyChecksum: boolean;
}

export interface MasterConfig {
  defaultProjectName: string;
  defaultAssetRoot: string;
  defaultArchiveRoot: string;
}

export interface PipelineConfig {
  /** Folder holding one <NN_Category>/setting tree per category */
  settingsRoot: string;
  transport: TransportKind;
  /** Channel files for the file transport */
  cacheDir: string;
  defaultChannel: string;
  sender: SenderConfig;
  receiver: ReceiverConfig;
  master: MasterConfig;
  /** Write the bundled preset folders on startup when missing */
  initializeInfra: boolean;
  logLevel: LogLevel;
}

export type PipelineConfigOverrides = Partial<Omit<PipelineConfig, 'sender' | 'receiver' | 'master'>> & {
  sender?: Partial<SenderConfig>;
  receiver?: Partial<ReceiverConfig>;
  master?: Partial<MasterConfig>;
};

export const DEFAULT_CONFIG: Omit<PipelineConfig, 'logLevel'> = {
  settingsRoot: './categories',
  transport: 'memory',
  cacheDir: '.cache/channels',
  defaultChannel: 'MASTER_CH',
  sender: {
    maxPayloadSize: 104857600, // 100 MB
    enableChecksum: true,
    format: 'json',
  },
  receiver: {
    verifyChecksum: true,
  },
  master: {
    defaultProjectName: 'PIPELINE_PROJ',
    defaultAssetRoot: 'output/Asset_Library',
    defaultArchiveRoot: 'output/Archive_Data',
  },
  initializeInfra: false,
};

export function resolveConfig(options: PipelineConfigOverrides = {}): PipelineConfig {
  return {
    ...DEFAULT_CONFIG,
    logLevel: getGlobalLogLevel(),
    ...options,
    sender: { ...DEFAULT_CONFIG.sender, ...options.sender },
    receiver: { ...DEFAULT_CONFIG.receiver, ...options.receiver },
    master: { ...DEFAULT_CONFIG.master, ...options.master },
  };
}
