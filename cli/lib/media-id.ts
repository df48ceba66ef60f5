/**
 * Media identifiers as they appear in upload logs, sticker packs and thumbnail
 * file names.
 */

/**
 * Return the segment after the last `/` of an `mxc://server/<id>` URL or any
 * slash-separated string. A value without `/` is returned unchanged.
 *
 * Loosely formatted values are accepted as-is; nothing is validated.
 */
export function extractMediaId(value: string): string {
  const slash = value.lastIndexOf('/');
  return slash === -1 ? value : value.slice(slash + 1);
}

