#!/usr/bin/env node
/**
 * Pin every media item listed in the upload log so the media repository purge
 * keeps it.
 * Usage:
 *   npm run mmr:pin-uploads -- <token> [--server mtx01.cc] [--uploads-file PATH] [--dry-run] [-v]
 */
import { errorMessage } from '../lib/errors';
import { applyPurpose } from '../services/mmr/purpose-batch';
import { collectUploadMediaIds, readUploadLog } from '../services/uploads/upload-log';
import {
  createAttributesClient,
  createCommandContext,
  pathOption,
  resolveAccessToken,
} from '../utils/command-context';

const TAG = '[mmr:pin-uploads]';

const USAGE = `Usage: mmr-pin-uploads <token> [options]

Set purpose=pinned on every media item in the upload log.

Options:
  --server NAME         Media repository server name (default from config)
  --uploads-file PATH   Upload log, one JSON record per line
  --dry-run             Print the requests instead of sending them
  -v, --verbose         Per-item diagnostics
  -h, --help            Show this help`;

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const context = await createCommandContext(argv, { options: ['--uploads-file'] });
    if (context.help) {
      console.log(USAGE);
      return 0;
    }

    const token = resolveAccessToken(context);
    const uploadsFile = pathOption(context, '--uploads-file', context.config.paths.uploadsFile);

    const lines = await readUploadLog(uploadsFile);
    const { mediaIds, invalid } = collectUploadMediaIds(lines);

    if (mediaIds.length === 0) {
      console.log(`${TAG} No valid media IDs found in ${uploadsFile}`);
      return 0;
    }

    console.log(
      `${TAG} Found ${mediaIds.length} media IDs in ${uploadsFile}` + (invalid ? `, invalid lines: ${invalid}` : '')
    );

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
