import natural from "natural";

import type { Tokenizer } from "../tokenizer.js";

const WORD_SEPARATOR = /[^\p{L}\p{N}]+/u;

export type Stem = (word: string) => string;

const porter: Stem = (word) => natural.PorterStemmer.stem(word);

/**
 * Word tokenizer:
 * - splits on anything that is not a letter or digit
 * - lowercases
 * - reduces each word with the Porter stemmer, or the stemmer it is given
 */
export class StemmingTokenizer implements Tokenizer {
  constructor(private readonly stem: Stem = porter) {}

  *tokenize(text: string): Iterable<string> {
    for (const word of text.split(WORD_SEPARATOR)) {
      if (!word) continue;
      const term = this.stem(word.toLowerCase());
      if (term) yield term;
    }
  }
}
