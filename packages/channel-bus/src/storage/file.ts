/**
 * File Transport - file-backed channel cache
 *
 * Layout per channel:
 *   <cacheDir>/<channel>_latest.json   current value
 *   <cacheDir>/<channel>_backup.json   previous value, rotated on each write
 *
 * Channel names are percent-encoded in file names, so distinct channels never
 * share a file and list() returns the names as they were written.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import type { BusValue, ChannelName, JsonValue } from '../types/index.js';
import type { ChannelTransport } from './adapter.js';
import { normalizeBusValue } from '../bus/envelope.js';
import { transportLogger } from '../utils/logger.js';

const LATEST_SUFFIX = '_latest.json';
const BACKUP_SUFFIX = '_backup.json';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function encodeChannel(channel: ChannelName): string {
  // encodeURIComponent leaves '*' alone, which is not allowed in file names everywhere
  return encodeURIComponent(channel).replace(/\*/g, '%2A');
}

function decodeChannel(encoded: string): ChannelName | null {
  try {
    return decodeURIComponent(encoded);
  } catch (error) {
    transportLogger.warn(`Skipping cache file with an undecodable name: ${encoded}`, error);
    return null;
  }
}

export class FileTransport implements ChannelTransport {
  readonly kind = 'file' as const;
  private cacheDir: string;

  constructor(cacheDir: string) {
    this.cacheDir = cacheDir;
  }

  async init(): Promise<void> {
    await fs.mkdir(this.cacheDir, { recursive: true });
  }

  async read(channel: ChannelName): Promise<BusValue | null> {
    return this.readFile(this.latestPath(channel));
  }

  /**
   * Value that was current before the last write
   */
  async readBackup(channel: ChannelName): Promise<BusValue | null> {
    return this.readFile(this.backupPath(channel));
  }

  async write(channel: ChannelName, value: BusValue): Promise<void> {
    await fs.mkdir(this.cacheDir, { recursive: true });

    const latest = this.latestPath(channel);
    const backup = this.backupPath(channel);

    try {
      await fs.rm(backup, { force: true });
      await fs.rename(latest, backup);
    } catch (error) {
      // Nothing to rotate on the first write
      if (!isMissing(error)) throw error;
    }

    await fs.writeFile(latest, JSON.stringify(value, null, 2), 'utf-8');
    transportLogger.debug(`Wrote ${path.basename(latest)}`);
  }

  async list(): Promise<ChannelName[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.cacheDir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
    const channels: ChannelName[] = [];
    for (const file of files) {
      if (!file.endsWith(LATEST_SUFFIX)) continue;
      const channel = decodeChannel(file.slice(0, -LATEST_SUFFIX.length));
      if (channel !== null) channels.push(channel);
    }
    return channels;
  }

  async close(): Promise<void> {
    // Every write goes straight to disk
  }

  // === Private Methods ===

  private async readFile(filePath: string): Promise<BusValue | null> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissing(error)) return null;
      transportLogger.warn(`Could not read ${filePath}`, error);
      return null;
    }

    let parsed: JsonValue;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      transportLogger.warn(`Malformed JSON in ${filePath}`, error);
      return null;
    }

    const value = normalizeBusValue(parsed);
    if (!value) {
      transportLogger.warn(`${filePath} holds neither an envelope nor a master record`);
    }
    return value;
  }

  private latestPath(channel: ChannelName): string {
    return path.join(this.cacheDir, `${encodeChannel(channel)}${LATEST_SUFFIX}`);
  }

  private backupPath(channel: ChannelName): string {
    return path.join(this.cacheDir, `${encodeChannel(channel)}${BACKUP_SUFFIX}`);
  }
}
