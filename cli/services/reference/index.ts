/**
 * Reference-set collectors
 */

import { PackReferenceCollector } from './pack-collector';
import type { PackReferenceCollectorOptions } from './pack-collector';
import { ThumbnailReferenceCollector } from './thumbnail-collector';
import type { ThumbnailReferenceCollectorOptions } from './thumbnail-collector';
import type { ReferenceCollector } from './types';

export type * from './types';
export { PackReferenceCollector, collectPackMediaIds, isPackFileName, PACK_INDEX_FILE } from './pack-collector';
export { ThumbnailReferenceCollector } from './thumbnail-collector';

export type ReferenceCollectorConfig =
  | ({ kind: 'packs' } & PackReferenceCollectorOptions)
  | ({ kind: 'thumbnails' } & ThumbnailReferenceCollectorOptions);

export function createReferenceCollector(config: ReferenceCollectorConfig): ReferenceCollector {
  switch (config.kind) {
    case 'packs':
      return new PackReferenceCollector(config);
    case 'thumbnails':
      return new ThumbnailReferenceCollector(config);
  }
}
