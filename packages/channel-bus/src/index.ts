/**
 * @asset-pipeline/channel-bus
 *
 * Lock-protected last-value channel bus with pluggable transports
 */

// Types
export * from './types/index.js';
export {
  JsonValueSchema,
  JsonObjectSchema,
  ProjectInfoSchema,
  MasterRecordSchema,
  EnvelopeMetadataSchema,
  PackedEnvelopeSchema,
} from './types/schemas.js';

// Core classes
export { ChannelBus } from './bus/channel-bus.js';
export {
  canonicalJson,
  computeChecksum,
  verifyChecksum,
  packEnvelope,
  isEnvelope,
  unpackBusValue,
  normalizeBusValue,
  normalizeMasterRecord,
} from './bus/envelope.js';

// Transports
export type { ChannelTransport } from './storage/index.js';
export { MemoryTransport, FileTransport } from './storage/index.js';

// Utils
export { Mutex } from './utils/mutex.js';
export type { Release } from './utils/mutex.js';
export { TypedEventEmitter } from './utils/events.js';
export type { EventCallback, EventMap } from './utils/events.js';
export { PipelineError, errorMessage } from './utils/errors.js';
export type { PipelineErrorCode } from './utils/errors.js';
export {
  Logger,
  createLogger,
  setGlobalLogLevel,
  getGlobalLogLevel,
  isLogLevel,
  busLogger,
  transportLogger,
  nodeLogger,
  archiveLogger,
  settingsLogger,
} from './utils/logger.js';
export type { LogLevel, LoggerConfig } from './utils/logger.js';

// === Factory Function ===

import type { TransportKind } from './types/index.js';
import type { ChannelTransport } from './storage/adapter.js';
import { ChannelBus } from './bus/channel-bus.js';
import { MemoryTransport } from './storage/memory.js';
import { FileTransport } from './storage/file.js';

export interface CreateChannelBusOptions {
  transport?: TransportKind;
  /** Directory for the file transport (default: .cache/channels) */
  cacheDir?: string;
}

/**
 * Create a bus over the selected transport
 */
export async function createChannelBus(options: CreateChannelBusOptions = {}): Promise<ChannelBus> {
  let transport: ChannelTransport;
  if (options.transport === 'file') {
    const fileTransport = new FileTransport(options.cacheDir ?? '.cache/channels');
    await fileTransport.init();
    transport = fileTransport;
  } else {
    transport = new MemoryTransport();
  }

  return new ChannelBus(transport);
}
