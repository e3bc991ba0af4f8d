/**
 * Channel Transport - backing store behind the channel bus
 */
import type { BusValue, ChannelName, TransportKind } from '../types/index.js';

export interface ChannelTransport {
  readonly kind: TransportKind;

  /**
   * Current value of a channel, or null when it was never written
   */
  read(channel: ChannelName): Promise<BusValue | null>;

  /**
   * Replace the value of a channel
   */
  write(channel: ChannelName, value: BusValue): Promise<void>;

  /**
   * Channels that currently hold a value
   */
  list(): Promise<ChannelName[]>;

  /**
   * Close/cleanup the transport
   */
  close(): Promise<void>;
}
