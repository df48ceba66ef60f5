import { MaintenanceError } from '../../lib/errors';
import { isDirectory, listRegularFiles } from '../../utils/fs-checks';
import { logger } from '../../utils/logger';
import type { ReferenceCollector } from './types';

export interface ThumbnailReferenceCollectorOptions {
  thumbnailsDir: string;
}

/**
 * Uses the thumbnail file names as the reference set; a thumbnail is stored
 * under its media ID, so names are taken verbatim.
 */
export class ThumbnailReferenceCollector implements ReferenceCollector {
  readonly source = 'thumbnails' as const;
  private readonly thumbnailsDir: string;

  constructor(options: ThumbnailReferenceCollectorOptions) {
    this.thumbnailsDir = options.thumbnailsDir;
  }

  async collect(): Promise<Set<string>> {
    if (!(await isDirectory(this.thumbnailsDir))) {
      throw new MaintenanceError(
        `Thumbnails directory not found: ${this.thumbnailsDir}`,
        'DIRECTORY_NOT_FOUND',
        this.thumbnailsDir
      );
    }

    const names = await listRegularFiles(this.thumbnailsDir);
    logger.debug(`Found ${names.length} thumbnail file(s) in ${this.thumbnailsDir}`);
    return new Set(names);
  }
}
