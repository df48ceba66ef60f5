import * as fs from 'fs/promises';
import * as path from 'path';
import { extractMediaId } from '../../lib/media-id';
import { MaintenanceError, errorMessage, toError } from '../../lib/errors';
import { logger } from '../../utils/logger';
import { isDirectory } from '../../utils/fs-checks';
import type { PackParseErrorPolicy, ReferenceCollector } from './types';

/** Pack-list manifest kept next to the packs; it is not a pack itself */
export const PACK_INDEX_FILE = 'index.json';

export interface PackReferenceCollectorOptions {
  packsDir: string;
  onParseError: PackParseErrorPolicy;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPackFileName(name: string): boolean {
  return name.endsWith('.json') && name !== PACK_INDEX_FILE;
}

/**
 * Add the media IDs a parsed pack document references to `into`.
 * Anything that does not have the expected shape is ignored.
 */
export function collectPackMediaIds(pack: unknown, into: Set<string>): void {
  if (!isRecord(pack)) return;

  const stickers = pack.stickers;
  if (!Array.isArray(stickers)) return;

  for (const sticker of stickers) {
    if (!isRecord(sticker)) continue;

    if (typeof sticker.id === 'string') {
      into.add(extractMediaId(sticker.id));
    }

    const info = sticker.info;
    if (isRecord(info) && typeof info.thumbnail_url === 'string') {
      into.add(extractMediaId(info.thumbnail_url));
    }
  }
}

/**
 * Collects media IDs referenced by the sticker pack documents in a directory
 */
export class PackReferenceCollector implements ReferenceCollector {
  readonly source = 'packs' as const;
  private readonly packsDir: string;
  private readonly onParseError: PackParseErrorPolicy;

  constructor(options: PackReferenceCollectorOptions) {
    this.packsDir = options.packsDir;
    this.onParseError = options.onParseError;
  }

  async collect(): Promise<Set<string>> {
    if (!(await isDirectory(this.packsDir))) {
      throw new MaintenanceError(
        `Packs directory not found: ${this.packsDir}`,
        'DIRECTORY_NOT_FOUND',
        this.packsDir
      );
    }

    const referenced = new Set<string>();
    const entries = await fs.readdir(this.packsDir, { withFileTypes: true });
    let packCount = 0;

    for (const entry of entries) {
      if (!entry.isFile() || !isPackFileName(entry.name)) continue;

      const packPath = path.join(this.packsDir, entry.name);
      const pack = await this.readPack(packPath);
      if (pack === undefined) continue;

      collectPackMediaIds(pack, referenced);
      packCount++;
    }

    logger.debug(`Collected ${referenced.size} media IDs from ${packCount} pack(s) in ${this.packsDir}`);
    return referenced;
  }

  /**
   * Parse a pack file. Returns undefined when the file is skipped.
   */
  private async readPack(packPath: string): Promise<unknown> {
    try {
      const content = await fs.readFile(packPath, 'utf-8');
      const pack: unknown = JSON.parse(content);
      return pack;
    } catch (error) {
      if (this.onParseError === 'throw') {
        throw new MaintenanceError(
          `Failed to parse pack JSON: ${packPath}: ${errorMessage(error)}`,
          'PACK_PARSE_FAILED',
          packPath,
          toError(error)
        );
      }
      logger.warn(`Skipping unreadable pack ${packPath}: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
