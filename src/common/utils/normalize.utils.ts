export interface NormalizedForms {
  readonly lowercase: string;
  readonly desubstituted: string;
}

/**
 * Leetspeak substitutions reversed by {@link desubstitute}. Multi-character
 * keys are tried before single characters at every position.
 */
export const SUBSTITUTIONS: Readonly<Record<string, string>> = Object.freeze({
  '|3': 'b',
  '|<': 'k',
  '()': 'o',
  '/\\': 'a',
  '\\/': 'v',
  '@': 'a',
  '4': 'a',
  '8': 'b',
  '(': 'c',
  '3': 'e',
  '6': 'g',
  '9': 'g',
  '#': 'h',
  '1': 'l',
  '|': 'l',
  '!': 'i',
  '0': 'o',
  $: 's',
  '5': 's',
  '7': 't',
  '+': 't',
  '2': 'z',
});

const KEY_LENGTHS = [
  ...new Set(Object.keys(SUBSTITUTIONS).map((key) => key.length)),
].sort((a, b) => b - a);

export function desubstitute(value: string): string {
  let result = '';
  let i = 0;
  while (i < value.length) {
    let matched = false;
    for (const length of KEY_LENGTHS) {
      const key = value.slice(i, i + length);
      const replacement = key.length === length ? SUBSTITUTIONS[key] : undefined;
      if (replacement !== undefined) {
        result += replacement;
        i += length;
        matched = true;
        break;
      }
    }
    if (!matched) {
      result += value[i];
      i += 1;
    }
  }
  return result;
}

export function normalize(password: string): NormalizedForms {
  const lowercase = password.toLowerCase();
  return Object.freeze({ lowercase, desubstituted: desubstitute(lowercase) });
}
