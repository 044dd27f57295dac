/**
 * Turns text into a stream of normalized terms.
 *
 * Contract notes:
 * - should be deterministic for given input
 * - documents and queries go through the same tokenizer, or terms will not line up
 */
export interface Tokenizer {
  tokenize(text: string): Iterable<string>;
}
