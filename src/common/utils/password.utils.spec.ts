import {
  charClasses,
  codePointLength,
  findRepeatedRun,
  findSequentialRun,
  isRunTriple,
} from './password.utils';

describe('password utils', () => {
  describe('findSequentialRun', () => {
    it('finds ascending and descending character runs', () => {
      expect(findSequentialRun('xabcx')).toBe('abc');
      expect(findSequentialRun('pin9321')).toBe('321');
    });

    it('finds keyboard rows in either direction', () => {
      expect(findSequentialRun('QwErty')).toBe('qwe');
      expect(findSequentialRun('x098')).toBe('098');
      expect(findSequentialRun('lkj!')).toBe('lkj');
    });

    it('ignores repeated characters', () => {
      expect(findSequentialRun('aaaa1111')).toBeNull();
    });

    it('reports the first run in the password', () => {
      expect(findSequentialRun('Tr0ub4dor&3xyz!Q')).toBe('xyz');
    });
  });

  describe('findRepeatedRun', () => {
    it('finds three or more identical characters', () => {
      expect(findRepeatedRun('aaaa1111')).toBe('aaaa');
      expect(findRepeatedRun('ab!!!')).toBe('!!!');
    });

    it('ignores pairs', () => {
      expect(findRepeatedRun('aabbcc')).toBeNull();
    });
  });

  it('counts character classes', () => {
    expect([...charClasses('aB3$')].sort()).toEqual([
      'digit',
      'lowercase',
      'symbol',
      'uppercase',
    ]);
    expect(charClasses('').size).toBe(0);
    expect(charClasses('aaaa1111').size).toBe(2);
  });

  it('measures length in code points', () => {
    expect(codePointLength('a😀b')).toBe(3);
  });

  it('treats runs case-insensitively', () => {
    expect(isRunTriple('A', 'b', 'C')).toBe(true);
    expect(isRunTriple('a', 'c', 'e')).toBe(false);
  });
});
