#!/usr/bin/env node
/**
 * Delete thumbnail files that no sticker pack references any more.
 * Usage:
 *   npm run mmr:prune-thumbs -- [--packs-dir PATH] [--thumbs-dir PATH] [--dry-run] [-v]
 */
import { errorMessage } from '../lib/errors';
import { PackReferenceCollector } from '../services/reference';
import { type PruneThumbnailsOptions, pruneThumbnails } from '../services/thumbnails/pruner';
import { createCommandContext, pathOption } from '../utils/command-context';

const TAG = '[mmr:prune-thumbs]';

const USAGE = `Usage: mmr-prune-thumbs [options]

Delete files in the thumbnails directory whose name is not referenced by any
sticker pack (index.json excluded). An unreadable pack aborts the run.

Options:
  --packs-dir PATH      Sticker pack directory
  --thumbs-dir PATH     Thumbnails directory
  --dry-run             List the files instead of deleting them
  -v, --verbose         Per-item diagnostics
  -h, --help            Show this help`;

export type PruneCommandOptions = Pick<PruneThumbnailsOptions, 'removeFile'>;

export async function main(
  argv: string[] = process.argv.slice(2),
  options: PruneCommandOptions = {}
): Promise<number> {
  try {
    const context = await createCommandContext(argv, { options: ['--packs-dir', '--thumbs-dir'] });
    if (context.help) {
      console.log(USAGE);
      return 0;
    }

    const packsDir = pathOption(context, '--packs-dir', context.config.paths.packsDir);
    const thumbnailsDir = pathOption(context, '--thumbs-dir', context.config.paths.thumbnailsDir);

    // Unreadable packs abort the prune
    const collector = new PackReferenceCollector({ packsDir, onParseError: 'throw' });
    const referencedIds = await collector.collect();

    const result = await pruneThumbnails({
      thumbnailsDir,
      referencedIds,
      dryRun: context.dryRun,
      removeFile: options.removeFile,
    });

    if (context.verbose) {
      console.log(`${TAG} Thumbnails: ${result.total}, referenced: ${result.kept}`);
    }

    if (result.dryRun) {
      console.log(`${TAG} (dry-run) Would delete ${result.removed} unused thumbnail(s)`);
    } else {
      console.log(`${TAG} Deleted ${result.removed} unused thumbnail(s)`);
    }

    if (result.failed.length > 0) {
      console.error(`${TAG} Failed to delete ${result.failed.length} file(s)`);
      return 1;
    }
    return 0;
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
