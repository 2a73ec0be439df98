const TRAILING_PUNCTUATION = /[.,!?;:'"”’)\]—-]/;

export function calculateFocusIndex(word: string): number {
  // Strip trailing punctuation for length calculation
  let len = word.length;
  while (len > 0 && TRAILING_PUNCTUATION.test(word[len - 1])) {
    len--;
  }

  if (len <= 1) return 0;
  return Math.floor((len - 1) / 2);
}

export function processText(text: string): string[] {
  return text
    .split(/\s+/)
    .filter(w => w.length > 0);
}
