/**
 * Channel Bus - process-wide last-value store keyed by channel name
 *
 * Every read and write goes through one mutex. The bus is created once and
 * handed by reference to the nodes that publish or read from it.
 */
import type { BusValue, ChannelName, TransportKind } from '../types/index.js';
import type { ChannelTransport } from '../storage/adapter.js';
import { MemoryTransport } from '../storage/memory.js';
import { Mutex } from '../utils/mutex.js';
import { PipelineError } from '../utils/errors.js';
import { busLogger } from '../utils/logger.js';

export class ChannelBus {
  private transport: ChannelTransport;
  private lock = new Mutex();

  constructor(transport: ChannelTransport = new MemoryTransport()) {
    this.transport = transport;
  }

  get transportKind(): TransportKind {
    return this.transport.kind;
  }

  /**
   * Overwrite the value held by a channel
   */
  async set(channel: ChannelName, value: BusValue): Promise<void> {
    this.assertChannel(channel);
    await this.lock.runExclusive(() => this.transport.write(channel, value));
    busLogger.debug(`Published to '${channel}'`);
  }

  /**
   * Current value of a channel, or null when it was never set
   */
  async get(channel: ChannelName): Promise<BusValue | null> {
    this.assertChannel(channel);
    return this.lock.runExclusive(() => this.transport.read(channel));
  }

  async channels(): Promise<ChannelName[]> {
    return this.lock.runExclusive(() => this.transport.list());
  }

  async close(): Promise<void> {
    await this.lock.runExclusive(() => this.transport.close());
  }

  private assertChannel(channel: ChannelName): void {
    if (channel.trim().length === 0) {
      throw new PipelineError('INVALID_CHANNEL', 'Channel name cannot be empty');
    }
  }
}
