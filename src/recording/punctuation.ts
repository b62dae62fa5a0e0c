const TRAILING_PUNCTUATION = new Set(Array.from('.,!?;:。，！？；：、…~～'));

/** Removes any run of ASCII or full-width punctuation from the end of `text`. */
export function stripTrailingPunctuation(text: string): string {
  const chars = Array.from(text);
  let end = chars.length;
  while (end > 0 && TRAILING_PUNCTUATION.has(chars[end - 1])) {
    end -= 1;
  }
  return end === chars.length ? text : chars.slice(0, end).join('');
}
