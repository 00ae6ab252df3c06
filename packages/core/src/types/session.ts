/**
 * One recorded plenary sitting. The string form produced by
 * `formatSessionKey` is the join key between transcripts, decoder output
 * and corpus tables.
 */
export interface SessionId {
  term: number;
  year: number;
  number: number;
}
