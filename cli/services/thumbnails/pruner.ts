import * as fs from 'fs/promises';
import * as path from 'path';
import { MaintenanceError, errorMessage } from '../../lib/errors';
import { isDirectory, listRegularFiles } from '../../utils/fs-checks';
import { logger } from '../../utils/logger';

export interface ThumbnailPrunePlan {
  keep: string[];
  remove: string[];
}

export interface PruneFailure {
  name: string;
  error: string;
}

export interface PruneThumbnailsOptions {
  thumbnailsDir: string;
  referencedIds: ReadonlySet<string>;
  dryRun?: boolean;
  /** Deletes one file; defaults to `fs.unlink` */
  removeFile?: (filePath: string) => Promise<void>;
}

export interface PruneThumbnailsResult {
  total: number;
  kept: number;
  /** Files deleted, or the number that would be deleted on a dry run */
  removed: number;
  failed: PruneFailure[];
  dryRun: boolean;
}

export async function listThumbnails(thumbnailsDir: string): Promise<string[]> {
  if (!(await isDirectory(thumbnailsDir))) {
    throw new MaintenanceError(
      `Thumbnails directory not found: ${thumbnailsDir}`,
      'DIRECTORY_NOT_FOUND',
      thumbnailsDir
    );
  }
  return listRegularFiles(thumbnailsDir);
}

export function planThumbnailPrune(names: string[], referencedIds: ReadonlySet<string>): ThumbnailPrunePlan {
  const keep: string[] = [];
  const remove: string[] = [];
  for (const name of names) {
    (referencedIds.has(name) ? keep : remove).push(name);
  }
  return { keep, remove };
}

/**
 * Delete thumbnails whose file name is not a referenced media ID.
 * A failed deletion is recorded and the remaining files are still processed.
 */
export async function pruneThumbnails(options: PruneThumbnailsOptions): Promise<PruneThumbnailsResult> {
  const { thumbnailsDir, referencedIds, dryRun = false, removeFile = fs.unlink } = options;

  const names = await listThumbnails(thumbnailsDir);
  const plan = planThumbnailPrune(names, referencedIds);

  logger.debug(
    `Thumbnails: ${names.length} total, ${referencedIds.size} referenced, ${plan.remove.length} to remove`
  );

  const failed: PruneFailure[] = [];
  let removed = 0;

  for (const name of plan.remove) {
    const filePath = path.join(thumbnailsDir, name);
    if (dryRun) {
      logger.info(`[dry-run] Would delete: ${filePath}`);
      removed++;
      continue;
    }

    try {
      await removeFile(filePath);
      removed++;
      logger.debug(`Deleted: ${filePath}`);
    } catch (error) {
      logger.error(`Failed to delete ${filePath}: ${errorMessage(error)}`);
      failed.push({ name, error: errorMessage(error) });
    }
  }

  return {
    total: names.length,
    kept: plan.keep.length,
    removed,
    failed,
    dryRun,
  };
}
