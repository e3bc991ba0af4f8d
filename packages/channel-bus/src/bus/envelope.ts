/**
 * Envelope - metadata wrapper around a master record in transit
 */
import { createHash } from 'crypto';
import type {
  BusValue,
  EnvelopeMetadata,
  EnvelopeOptions,
  JsonValue,
  MasterRecord,
  PackedEnvelope,
  UnpackOptions,
  UnpackResult,
} from '../types/index.js';
import { isJsonObject } from '../types/index.js';
import { MasterRecordSchema, PackedEnvelopeSchema } from '../types/schemas.js';

/**
 * JSON with object keys sorted at every depth
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, current: unknown) => {
    if (typeof current === 'object' && current !== null && !Array.isArray(current)) {
      const entries = Object.entries(current).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      return Object.fromEntries(entries);
    }
    return current;
  });
}

export function computeChecksum(payload: unknown): string {
  return createHash('sha256').update(canonicalJson(payload), 'utf8').digest('hex');
}

export function verifyChecksum(payload: unknown, checksum: string): boolean {
  return computeChecksum(payload) === checksum;
}

export function packEnvelope(record: MasterRecord, options: EnvelopeOptions): PackedEnvelope {
  const metadata: EnvelopeMetadata = {
    channel: options.channel,
    sender: options.sender,
    timestamp: options.timestamp ?? Math.floor(Date.now() / 1000),
    format: options.format,
    checksum: options.enableChecksum ? computeChecksum(record) : '',
  };
  return { metadata, payload: record };
}

export function isEnvelope(value: BusValue): value is PackedEnvelope {
  return 'metadata' in value && 'payload' in value;
}

/**
 * Unwrap an envelope (verifying its checksum when asked) or pass a bare record through
 */
export function unpackBusValue(value: BusValue, options: UnpackOptions): UnpackResult {
  if (!isEnvelope(value)) {
    return { ok: true, record: value, envelope: null };
  }

  const { metadata, payload } = value;
  if (options.verifyChecksum && metadata.checksum !== '' && !verifyChecksum(payload, metadata.checksum)) {
    return { ok: false, reason: `Checksum mismatch on channel '${metadata.channel}'` };
  }
  return { ok: true, record: payload, envelope: metadata };
}

// =============================================================================
// Normalization of values read back from JSON
// =============================================================================

export function normalizeMasterRecord(value: JsonValue): MasterRecord | null {
  const result = MasterRecordSchema.safeParse(value);
  return result.success ? result.data : null;
}

/**
 * Turn parsed JSON into a bus value, or null when it is neither an envelope nor a record
 */
export function normalizeBusValue(value: JsonValue): BusValue | null {
  if (!isJsonObject(value)) return null;

  if ('metadata' in value || 'payload' in value) {
    const result = PackedEnvelopeSchema.safeParse(value);
    return result.success ? result.data : null;
  }

  return normalizeMasterRecord(value);
}
