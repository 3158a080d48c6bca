const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

/**
 * Splits `text` into positional slices of at most `limit` UTF-16 units.
 * A slice never ends between the two halves of a surrogate pair, so such a
 * slice is one unit shorter than `limit`.
 */
export const chunkText = (text: string, limit: number): string[] => {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`chunk limit must be a positive integer, got ${limit}`);
  }
  const chunks: string[] = [];
  let offset = 0;
  while (offset < text.length) {
    let end = Math.min(offset + limit, text.length);
    if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) {
      // A limit of 1 cannot hold a pair; keep the pair whole instead.
      end = end - 1 > offset ? end - 1 : end + 1;
    }
    chunks.push(text.slice(offset, end));
    offset = end;
  }
  return chunks;
};
