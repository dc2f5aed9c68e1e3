/**
 * Complexity-stratified API namespaces.
 *
 * - `query.*`: O(1) reads and lookups bounded by the piece count
 * - `scan.*`: O(n) operations over the whole text
 */

export { query } from './query.ts';
export { scan } from './scan.ts';
