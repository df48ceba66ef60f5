/**
 * Sources of "in use" media IDs
 */

export interface ReferenceCollector {
  /** Short label used in log lines, e.g. `packs` or `thumbnails` */
  readonly source: ReferenceSource;
  collect(): Promise<Set<string>>;
}

export type ReferenceSource = 'packs' | 'thumbnails';

/**
 * What to do with a pack file that is not valid JSON.
 * `throw` aborts the run, `skip` logs a warning and moves on.
 */
export type PackParseErrorPolicy = 'throw' | 'skip';
