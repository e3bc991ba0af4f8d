/**
 * Shared types for channel-bus and pipeline-nodes packages
 */

// =============================================================================
// JSON Types
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Categories
// =============================================================================

export const CATEGORY_KEYS = [
  '01_Background',
  '02_Equipment',
  '03_Character',
  '04_Structure',
  '05_SpecialEffects',
  '06_Audio',
] as const;

export type CategoryKey = (typeof CATEGORY_KEYS)[number];

export function isCategoryKey(value: string): value is CategoryKey {
  return CATEGORY_KEYS.some((key) => key === value);
}

/** Parameter name → value for one category */
export type CategoryRecord = JsonObject;

// =============================================================================
// Records
// =============================================================================

export type ChannelName = string;

export type ProjectInfo = {
  name: string;
  root: string;
  timestamp: string;
} & JsonObject;

export type CategorySettings = { [key: string]: CategoryRecord };

/** Unit of exchange placed on the bus and persisted to the archive */
export type MasterRecord = {
  project_info: ProjectInfo;
  settings: CategorySettings;
};

export type EnvelopeFormat = 'json';

export type EnvelopeMetadata = {
  channel: ChannelName;
  sender: string;
  timestamp: number;         // Unix seconds
  format: EnvelopeFormat;
  checksum: string;          // SHA-256 hex, '' when disabled
};

export type PackedEnvelope = {
  metadata: EnvelopeMetadata;
  payload: MasterRecord;
};

export type BusValue = MasterRecord | PackedEnvelope;

// =============================================================================
// Status
// =============================================================================

export enum TransferStatus {
  SUCCESS = 'SUCCESS',
  FAILED = 'FAILED',
}

// =============================================================================
// Config Types
// =============================================================================

export type TransportKind = 'memory' | 'file';

export interface EnvelopeOptions {
  channel: ChannelName;
  sender: string;
  enableChecksum: boolean;
  format: EnvelopeFormat;
  /** Unix seconds; defaults to now */
  timestamp?: number;
}

export interface UnpackOptions {
  verifyChecksum: boolean;
}

export type UnpackResult =
  | { ok: true; record: MasterRecord; envelope: EnvelopeMetadata | null }
  | { ok: false; reason: string };
