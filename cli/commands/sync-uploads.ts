#!/usr/bin/env node
/**
 * Drop upload-log entries whose media is no longer referenced, and un-pin them.
 *
 * The reference set comes from the sticker packs (sticker `id` and
 * `info.thumbnail_url`, index.json excluded) or, with `--source thumbnails`,
 * from the thumbnail file names. Each dropped entry gets purpose=none on the
 * media repository and is appended to the removal log; the upload log is
 * rewritten once, after all requests.
 * Usage:
 *   npm run mmr:sync-uploads -- <token> [--source packs|thumbnails] [--no-mark] [--dry-run] [-v]
 */
import { errorMessage } from '../lib/errors';
import { extractMediaId } from '../lib/media-id';
import { applyPurpose } from '../services/mmr/purpose-batch';
import { createReferenceCollector, type ReferenceCollectorConfig, type ReferenceSource } from '../services/reference';
import {
  appendRemovalLog,
  filterUploadLines,
  readUploadLog,
  writeUploadLog,
} from '../services/uploads/upload-log';
import { ArgumentError } from '../utils/args';
import {
  type CommandContext,
  createAttributesClient,
  createCommandContext,
  pathOption,
  resolveAccessToken,
} from '../utils/command-context';

const TAG = '[mmr:sync-uploads]';

const USAGE = `Usage: mmr-sync-uploads [token] [options]

Remove upload-log entries whose media ID is not referenced any more, set
purpose=none on them and append them to the removal log.

Options:
  --source packs|thumbnails   Reference set (default: packs)
  --server NAME               Media repository server name (default from config)
  --uploads-file PATH         Upload log, one JSON record per line
  --packs-dir PATH            Sticker pack directory (--source packs)
  --thumbs-dir PATH           Thumbnails directory (--source thumbnails)
  --removed-file PATH         Removal log for dropped entries
  --no-mark                   Drop entries without touching purpose or the removal log;
                              no token needed
  --dry-run                   Report what would change; write and send nothing
  -v, --verbose               Per-item diagnostics
  -h, --help                  Show this help`;

function parseSource(value: string | undefined): ReferenceSource {
  if (value === undefined || value === 'packs') return 'packs';
  if (value === 'thumbnails') return 'thumbnails';
  throw new ArgumentError(`--source must be "packs" or "thumbnails", got "${value}"`);
}

function collectorConfig(context: CommandContext, source: ReferenceSource): ReferenceCollectorConfig {
  if (source === 'thumbnails') {
    return {
      kind: 'thumbnails',
      thumbnailsDir: pathOption(context, '--thumbs-dir', context.config.paths.thumbnailsDir),
    };
  }
  // Unreadable packs are skipped with a warning while syncing
  return {
    kind: 'packs',
    packsDir: pathOption(context, '--packs-dir', context.config.paths.packsDir),
    onParseError: 'skip',
  };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const context = await createCommandContext(argv, {
      flags: ['--no-mark'],
      options: ['--source', '--uploads-file', '--packs-dir', '--thumbs-dir', '--removed-file'],
    });
    if (context.help) {
      console.log(USAGE);
      return 0;
    }

    const source = parseSource(context.args.options.get('--source'));
    const mark = !context.args.flags.has('--no-mark');
    const token = mark ? resolveAccessToken(context) : undefined;
    const uploadsFile = pathOption(context, '--uploads-file', context.config.paths.uploadsFile);
    const removedLog = pathOption(context, '--removed-file', context.config.paths.removedLog);

    const referencedIds = await createReferenceCollector(collectorConfig(context, source)).collect();
    if (context.verbose) {
      console.log(`${TAG} Referenced media IDs (${source}): ${referencedIds.size}`);
    }

    const lines = await readUploadLog(uploadsFile);
    const result = filterUploadLines(lines, referencedIds, { mark });

    if (context.verbose) {
      console.log(
        `${TAG} Upload log lines: ${lines.length}, kept: ${result.kept.length}, removed: ${result.droppedCount}`
      );
    }

    if (result.droppedCount === 0) {
      console.log(`${TAG} Nothing to remove`);
      return 0;
    }

    const mediaIds = result.removed.map((record) => extractMediaId(record.url));

    if (context.dryRun) {
      if (token !== undefined) {
        const client = createAttributesClient(context, token);
        await applyPurpose(client, mediaIds, 'none', { dryRun: true, tag: TAG });
      }
      const marking = mark ? 'set purpose=none on and ' : '';
      console.log(
        `${TAG} (dry-run) Would ${marking}remove ${result.droppedCount} entr${result.droppedCount === 1 ? 'y' : 'ies'}; ` +
          'upload log and media repository left untouched'
      );
      return 0;
    }

    let failed = 0;
    if (token !== undefined) {
      const client = createAttributesClient(context, token);
      const batch = await applyPurpose(client, mediaIds, 'none', { dryRun: false, tag: TAG });
      failed = batch.failed.length;
      console.log(`${TAG} purpose=none updates: ${batch.succeeded} succeeded, ${failed} failed`);
    }

    await writeUploadLog(uploadsFile, result.kept);
    await appendRemovalLog(removedLog, result.removed);

    console.log(
      `${TAG} Removed ${result.droppedCount} entr${result.droppedCount === 1 ? 'y' : 'ies'} from ${uploadsFile}`
    );
    return failed === 0 ? 0 : 1;
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
