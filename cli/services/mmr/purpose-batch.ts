import { logger } from '../../utils/logger';
import {
  type MediaAttributesClient,
  type MediaPurpose,
  type SetPurposeResult,
  formatResponseBody,
  isSuccess,
  statusOf,
} from './media-attributes';

export interface PurposeFailure {
  mediaId: string;
  status: number;
  detail: string;
}

export interface PurposeBatchResult {
  succeeded: number;
  failed: PurposeFailure[];
}

export interface PurposeBatchOptions {
  dryRun: boolean;
  /** Prefix for the lines printed per item, e.g. `[mmr:pin-uploads]` */
  tag: string;
}

function describeFailure(result: SetPurposeResult): string {
  if (result.kind === 'transport-failure') {
    return result.description;
  }
  return result.body ? formatResponseBody(result.body) : '';
}

/**
 * Set `purpose` on each media ID, one request at a time, in order.
 * Failures are reported and counted; the batch always runs to the end.
 * A dry run prints the requests and counts them as successes.
 */
export async function applyPurpose(
  client: MediaAttributesClient,
  mediaIds: Iterable<string>,
  purpose: MediaPurpose,
  options: PurposeBatchOptions
): Promise<PurposeBatchResult> {
  const failed: PurposeFailure[] = [];
  let succeeded = 0;

  for (const mediaId of mediaIds) {
    if (options.dryRun) {
      console.log(`${options.tag} [dry-run] ${client.describeRequest(mediaId, purpose)}`);
      succeeded++;
      continue;
    }

    const result = await client.setPurpose(mediaId, purpose);
    const status = statusOf(result);

    if (isSuccess(result)) {
      succeeded++;
      logger.debug(`purpose=${purpose} set on ${mediaId} (status ${status})`);
      continue;
    }

    const detail = describeFailure(result);
    failed.push({ mediaId, status, detail });
    console.error(`${options.tag} Failed to set purpose=${purpose} on ${mediaId} (status ${status})`);
    if (detail) {
      console.error(detail);
    }
  }

  return { succeeded, failed };
}
