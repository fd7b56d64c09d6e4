import { desubstitute, normalize } from './normalize.utils';

describe('normalize', () => {
  it('produces lowercase and desubstituted forms', () => {
    expect(normalize('MyP@ssw0rd')).toEqual({
      lowercase: 'myp@ssw0rd',
      desubstituted: 'mypassword',
    });
  });

  it('accepts the empty string', () => {
    expect(normalize('')).toEqual({ lowercase: '', desubstituted: '' });
  });

  it('leaves text without substitutions unchanged', () => {
    const forms = normalize('Correct horse');
    expect(forms.desubstituted).toBe(forms.lowercase);
  });

  it('returns frozen forms', () => {
    expect(Object.isFrozen(normalize('abc'))).toBe(true);
  });

  it('is idempotent on the lowercase form', () => {
    for (const password of ['MyP@ssw0rd', 'ÀBÇ123', 'Tr0ub4dor&3', '', 'ΣΊΣΥΦΟΣ']) {
      const once = normalize(password).lowercase;
      expect(normalize(once).lowercase).toBe(once);
    }
  });
});

describe('desubstitute', () => {
  it('maps common leetspeak characters', () => {
    expect(desubstitute('h3ll0 w0rld!')).toBe('hello worldi');
    expect(desubstitute('$7@r')).toBe('star');
  });

  it('prefers multi-character keys at the same position', () => {
    expect(desubstitute('|3')).toBe('b');
    expect(desubstitute('|<')).toBe('k');
    expect(desubstitute('|x')).toBe('lx');
    expect(desubstitute('()()')).toBe('oo');
    expect(desubstitute('/\\dmin')).toBe('admin');
  });

  it('makes a single left-to-right pass', () => {
    // The second "(" pairs with ")" and is never rewritten to "c".
    expect(desubstitute('(()')).toBe('co');
  });
});
