/**
 * Archive - durable history of every master record
 *
 *   <archiveRoot>/archiving_list.txt                      one line per run
 *   <archiveRoot>/archive_dictionary/<ts>_<project>.json  full record
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import type { BusValue, JsonValue, MasterRecord } from '@asset-pipeline/channel-bus';
import {
  CATEGORY_KEYS,
  PipelineError,
  archiveLogger,
  errorMessage,
  normalizeBusValue,
} from '@asset-pipeline/channel-bus';

export const ARCHIVE_INDEX_FILE = 'archiving_list.txt';
export const ARCHIVE_DIR = 'archive_dictionary';

// Suffixes tried when two runs of one project land in the same second
const MAX_NAME_ATTEMPTS = 1000;

const INDEX_LINE = /^\[(\d{8}_\d{6})\] PROJ: (.*) \| FILE: (.+)$/;

export interface ArchiveEntry {
  timestamp: string;
  project: string;
  file: string;
}

export interface ArchivedRecord extends ArchiveEntry {
  /** Absolute path of the JSON file written */
  path: string;
}

export type ArchiveLoadResult =
  | { status: 'loaded'; value: BusValue }
  | { status: 'missing' }
  | { status: 'invalid'; reason: string };

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function formatIndexLine(entry: ArchiveEntry): string {
  return `[${entry.timestamp}] PROJ: ${entry.project} | FILE: ${entry.file}\n`;
}

/**
 * Create one asset folder per category under the project root
 */
export async function ensureCategoryFolders(projectRoot: string): Promise<string[]> {
  const folders = CATEGORY_KEYS.map((key) => path.join(projectRoot, key));
  try {
    for (const folder of folders) {
      await fs.mkdir(folder, { recursive: true });
    }
  } catch (error) {
    throw new PipelineError(
      'ARCHIVE_WRITE_FAILED',
      `Could not create asset folders under ${projectRoot}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  return folders;
}

/**
 * Write the record to a fresh archive file, then append its index line
 */
export async function archiveRecord(archiveRoot: string, record: MasterRecord): Promise<ArchivedRecord> {
  const root = path.resolve(archiveRoot);
  const dir = path.join(root, ARCHIVE_DIR);
  const { name: project, timestamp } = record.project_info;
  const content = JSON.stringify(record, null, 4);

  try {
    await fs.mkdir(dir, { recursive: true });

    const file = await createUniqueFile(dir, `${timestamp}_${project}`, content);
    const entry: ArchiveEntry = { timestamp, project, file };

    // A single append per run keeps concurrent index lines whole
    await fs.appendFile(path.join(root, ARCHIVE_INDEX_FILE), formatIndexLine(entry), 'utf-8');
    archiveLogger.info(`Archived ${project} as ${file}`);

    return { ...entry, path: path.join(dir, file) };
  } catch (error) {
    if (error instanceof PipelineError) throw error;
    throw new PipelineError(
      'ARCHIVE_WRITE_FAILED',
      `Could not archive ${project} under ${root}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

async function createUniqueFile(dir: string, baseName: string, content: string): Promise<string> {
  for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
    const file = attempt === 0 ? `${baseName}.json` : `${baseName}_${attempt}.json`;
    try {
      await fs.writeFile(path.join(dir, file), content, { encoding: 'utf-8', flag: 'wx' });
      return file;
    } catch (error) {
      if (!hasCode(error, 'EEXIST')) throw error;
    }
  }
  throw new PipelineError(
    'ARCHIVE_WRITE_FAILED',
    `No free archive file name for ${baseName} after ${MAX_NAME_ATTEMPTS} attempts`
  );
}

/**
 * Parse archiving_list.txt; lines that do not match the index format are skipped
 */
export async function readArchiveIndex(archiveRoot: string): Promise<ArchiveEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(path.join(path.resolve(archiveRoot), ARCHIVE_INDEX_FILE), 'utf-8');
  } catch (error) {
    if (hasCode(error, 'ENOENT')) return [];
    throw error;
  }

  const entries: ArchiveEntry[] = [];
  for (const line of content.split(/\r?\n/)) {
    const match = INDEX_LINE.exec(line);
    if (match) {
      entries.push({ timestamp: match[1], project: match[2], file: match[3] });
    }
  }
  return entries;
}

export async function loadArchiveRecord(filePath: string): Promise<ArchiveLoadResult> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (hasCode(error, 'ENOENT')) return { status: 'missing' };
    return { status: 'invalid', reason: errorMessage(error) };
  }

  let parsed: JsonValue;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return { status: 'invalid', reason: `Malformed JSON: ${errorMessage(error)}` };
  }

  const value = normalizeBusValue(parsed);
  if (!value) {
    return { status: 'invalid', reason: 'File does not hold a master record' };
  }
  return { status: 'loaded', value };
}
