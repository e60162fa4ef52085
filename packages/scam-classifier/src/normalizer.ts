/**
 * Characters replaced by a space before splitting. This is the default
 * `filters` string of the Keras `Tokenizer` the model was trained with and
 * must stay byte-for-byte identical to it.
 */
export const TEXT_FILTERS = '!"#$%&()*+,-./:;<=>?@[\\]^_`{|}~\t\n';

const FILTER_SET = new Set(TEXT_FILTERS);

const ASCII_WHITESPACE_RUN = /[ \t\n\v\f\r]+/g;

export function normalizeText(text: string): string {
  const lower = text.toLowerCase();
  let filtered = '';
  for (const ch of lower) {
    filtered += FILTER_SET.has(ch) ? ' ' : ch;
  }
  return filtered.replace(ASCII_WHITESPACE_RUN, ' ').trim();
}

export function tokenizeText(text: string): string[] {
  const normalized = normalizeText(text);
  if (!normalized) return [];
  return normalized.split(' ').filter((token) => token.length > 0);
}
