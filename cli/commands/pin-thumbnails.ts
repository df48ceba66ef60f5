#!/usr/bin/env node
/**
 * Pin the media behind every thumbnail file. Thumbnails are stored under their
 * media ID, so the file names are the IDs to pin.
 * Usage:
 *   npm run mmr:pin-thumbs -- <token> [--server mtx01.cc] [--thumbs-dir PATH] [--dry-run] [-v]
 */
import { errorMessage } from '../lib/errors';
import { applyPurpose } from '../services/mmr/purpose-batch';
import { ThumbnailReferenceCollector } from '../services/reference';
import {
  createAttributesClient,
  createCommandContext,
  pathOption,
  resolveAccessToken,
} from '../utils/command-context';

const TAG = '[mmr:pin-thumbs]';

const USAGE = `Usage: mmr-pin-thumbs <token> [options]

Set purpose=pinned on the media ID of every file in the thumbnails directory.

Options:
  --server NAME         Media repository server name (default from config)
  --thumbs-dir PATH     Thumbnails directory
  --dry-run             Print the requests instead of sending them
  -v, --verbose         Per-item diagnostics
  -h, --help            Show this help`;

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const context = await createCommandContext(argv, { options: ['--thumbs-dir'] });
    if (context.help) {
      console.log(USAGE);
      return 0;
    }

    const token = resolveAccessToken(context);
    const thumbnailsDir = pathOption(context, '--thumbs-dir', context.config.paths.thumbnailsDir);

    const mediaIds = await new ThumbnailReferenceCollector({ thumbnailsDir }).collect();
    if (mediaIds.size === 0) {
      console.log(`${TAG} No thumbnail files found in ${thumbnailsDir}`);
      return 0;
    }

    console.log(`${TAG} Found ${mediaIds.size} thumbnail(s) in ${thumbnailsDir}`);

    const client = createAttributesClient(context, token);
    const result = await applyPurpose(client, mediaIds, 'pinned', { dryRun: context.dryRun, tag: TAG });

    const action = context.dryRun ? `${TAG} (dry-run)` : TAG;
    console.log(`${action} Completed. Success: ${result.succeeded}, Failed: ${result.failed.length}`);
    return result.failed.length === 0 ? 0 : 1;
  } catch (error) {
    console.error(`${TAG} Failed:`, errorMessage(error));
    return 1;
  }
}

if (require.main === module) {
  void main().then((code) => {
    process.exitCode = code;
  });
}

export default main;
