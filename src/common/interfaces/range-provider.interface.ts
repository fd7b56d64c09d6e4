export const RANGE_PROVIDER = 'IRangeProvider';

/**
 * Source of k-anonymity range responses: every known hash suffix that shares
 * the given 5-character prefix, one `SUFFIX:COUNT` pair per line.
 */
export interface IRangeProvider {
  fetchRange(prefix: string, signal?: AbortSignal): Promise<string>;
}
