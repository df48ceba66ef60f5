/**
 * Upload log: newline-delimited JSON, one record per uploaded media item.
 *
 *   {"url": "mxc://example.org/AbCdEf", "purpose": "pinned", ...}
 *
 * Lines are never reformatted. Kept lines are written back byte-for-byte,
 * blank lines and lines that cannot be understood included.
 */

import * as fs from 'fs/promises';
import fse from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { extractMediaId } from '../../lib/media-id';
import { MaintenanceError, errorMessage } from '../../lib/errors';
import { isFile } from '../../utils/fs-checks';
import { logger } from '../../utils/logger';

/** Any JSON object; key order is kept so rewritten records read like the source */
const UploadFieldsSchema = z.record(z.unknown());

export interface UploadRecord {
  url: string;
  [field: string]: unknown;
}

export type ParsedUploadLine =
  | { kind: 'blank' }
  | { kind: 'invalid'; reason: string }
  | { kind: 'record'; record: UploadRecord; mediaId: string };

/**
 * Only a string `url` is required. Every other field, `purpose` included,
 * may hold any value and is carried through untouched.
 */
export function parseUploadLine(line: string): ParsedUploadLine {
  const trimmed = line.trim();
  if (trimmed === '') {
    return { kind: 'blank' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (error) {
    return { kind: 'invalid', reason: `not valid JSON (${errorMessage(error)})` };
  }

  const fields = UploadFieldsSchema.safeParse(parsed);
  if (!fields.success) {
    return { kind: 'invalid', reason: 'not a JSON object' };
  }

  const url = fields.data.url;
  if (typeof url !== 'string') {
    return { kind: 'invalid', reason: 'missing a string "url" field' };
  }

  const record: UploadRecord = { ...fields.data, url };
  return { kind: 'record', record, mediaId: extractMediaId(url) };
}

/**
 * Read the log as lines. A final newline does not produce an extra empty line.
 */
export async function readUploadLog(filePath: string): Promise<string[]> {
  if (!(await isFile(filePath))) {
    throw new MaintenanceError(`Uploads file not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
  }
  const content = await fs.readFile(filePath, 'utf-8');
  return splitLines(content);
}

export function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Overwrite the log with `lines`. Every line, the last one included, is
 * newline-terminated, so trailing blank lines survive a read/write cycle.
 */
export async function writeUploadLog(filePath: string, lines: string[]): Promise<void> {
  const content = lines.map((line) => `${line}\n`).join('');
  await fse.outputFile(filePath, content, 'utf-8');
}

/**
 * Append removed records to the side log, one JSON object per line.
 */
export async function appendRemovalLog(filePath: string, records: UploadRecord[]): Promise<void> {
  if (records.length === 0) return;
  await fse.ensureDir(path.dirname(filePath));
  const content = records.map((record) => JSON.stringify(record)).join('\n') + '\n';
  await fs.appendFile(filePath, content, 'utf-8');
}

export interface FilterUploadOptions {
  /**
   * Record each dropped entry, with `purpose` set to `none`, in `removed`.
   * Without it dropped lines simply disappear.
   */
  mark: boolean;
}

export interface FilterUploadResult {
  kept: string[];
  removed: UploadRecord[];
  /** Number of dropped lines, whether or not they were marked */
  droppedCount: number;
  /** Lines kept because they could not be read as an upload record */
  unreadable: number;
}

/**
 * Keep the lines whose media ID is referenced; drop the others.
 * Blank and unreadable lines are always kept.
 */
export function filterUploadLines(
  lines: string[],
  referencedIds: ReadonlySet<string>,
  options: FilterUploadOptions
): FilterUploadResult {
  const kept: string[] = [];
  const removed: UploadRecord[] = [];
  let droppedCount = 0;
  let unreadable = 0;

  lines.forEach((line, index) => {
    const parsed = parseUploadLine(line);

    switch (parsed.kind) {
      case 'blank':
        kept.push(line);
        return;
      case 'invalid':
        logger.warn(`Line ${index + 1} is ${parsed.reason}, keeping it as-is`);
        unreadable++;
        kept.push(line);
        return;
      case 'record':
        if (referencedIds.has(parsed.mediaId)) {
          kept.push(line);
          return;
        }
        droppedCount++;
        logger.debug(`Removing unreferenced media: ${parsed.mediaId}`);
        if (options.mark) {
          removed.push({ ...parsed.record, purpose: 'none' });
        }
    }
  });

  return { kept, removed, droppedCount, unreadable };
}

export interface UploadMediaIds {
  mediaIds: string[];
  invalid: number;
}

/**
 * Media IDs of every readable record, in file order. Blank lines are ignored.
 */
export function collectUploadMediaIds(lines: string[]): UploadMediaIds {
  const mediaIds: string[] = [];
  let invalid = 0;

  for (const line of lines) {
    const parsed = parseUploadLine(line);
    if (parsed.kind === 'blank') continue;
    if (parsed.kind === 'record' && parsed.mediaId !== '') {
      mediaIds.push(parsed.mediaId);
    } else {
      invalid++;
    }
  }

  return { mediaIds, invalid };
}
