/**
 * Memory Transport - in-process last-value map
 *
 * Values are copied on the way in and out, so no reader shares an object with
 * the writer or with another reader.
 */
import type { BusValue, ChannelName } from '../types/index.js';
import type { ChannelTransport } from './adapter.js';

export class MemoryTransport implements ChannelTransport {
  readonly kind = 'memory' as const;
  private data: Map<ChannelName, BusValue> = new Map();

  async read(channel: ChannelName): Promise<BusValue | null> {
    const value = this.data.get(channel);
    return value === undefined ? null : structuredClone(value);
  }

  async write(channel: ChannelName, value: BusValue): Promise<void> {
    this.data.set(channel, structuredClone(value));
  }

  async list(): Promise<ChannelName[]> {
    return [...this.data.keys()];
  }

  async close(): Promise<void> {
    // No-op for memory transport
  }
}
