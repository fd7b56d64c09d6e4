export type CharClass = 'lowercase' | 'uppercase' | 'digit' | 'symbol';

export const KEYBOARD_ROWS = ['qwertyuiop', 'asdfghjkl', 'zxcvbnm', '1234567890'];

const KEYBOARD_TRIPLES = new Set(
  KEYBOARD_ROWS.flatMap((row) => {
    const reversed = [...row].reverse().join('');
    const triples: string[] = [];
    for (const source of [row, reversed]) {
      for (let i = 0; i + 3 <= source.length; i++) {
        triples.push(source.slice(i, i + 3));
      }
    }
    return triples;
  }),
);

export function classOf(char: string): CharClass {
  if (/\p{Ll}/u.test(char)) return 'lowercase';
  if (/\p{Lu}/u.test(char)) return 'uppercase';
  if (/\p{Nd}/u.test(char)) return 'digit';
  return 'symbol';
}

export function charClasses(password: string): Set<CharClass> {
  return new Set([...password].map(classOf));
}

export function codePointLength(value: string): number {
  return [...value].length;
}

/** True when `a`, `b`, `c` step by +1 or -1 in code point or sit together on a keyboard row. */
export function isRunTriple(a: string, b: string, c: string): boolean {
  const [x, y, z] = [a, b, c].map((char) => char.toLowerCase().codePointAt(0) ?? 0);
  const step = y - x;
  if ((step === 1 || step === -1) && z - y === step) return true;
  return KEYBOARD_TRIPLES.has(`${a}${b}${c}`.toLowerCase());
}

export function findSequentialRun(value: string): string | null {
  const chars = [...value.toLowerCase()];
  for (let i = 0; i + 3 <= chars.length; i++) {
    if (isRunTriple(chars[i], chars[i + 1], chars[i + 2])) {
      return chars.slice(i, i + 3).join('');
    }
  }
  return null;
}

export function findRepeatedRun(value: string): string | null {
  const match = /(.)\1{2,}/su.exec(value);
  return match ? match[0] : null;
}
