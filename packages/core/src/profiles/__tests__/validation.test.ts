import { InvalidEmailError, InvalidNameError } from '../../errors';
import { isValidEmail, validateEmail, validateName } from '../validation';

describe('validateEmail', () => {
  it('accepts ordinary addresses and trims them', () => {
    expect(validateEmail('jane.doe+git@corp.example.com')).toEqual({
      ok: true,
      value: 'jane.doe+git@corp.example.com',
    });
    expect(validateEmail('  jane@example.org ')).toEqual({ ok: true, value: 'jane@example.org' });
  });

  it.each(['', 'jane', 'jane@', 'jane@example', 'jane@example.c', 'ja ne@example.com'])(
    'rejects %j',
    (input) => {
      const result = validateEmail(input);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidEmailError);
        expect(result.error.code).toBe('INVALID_EMAIL');
      }
    }
  );

  it('names the rejected value in the message', () => {
    const result = validateEmail('jane@example');
    expect(result.ok ? '' : result.error.message).toBe('Invalid email format: jane@example');
  });

  it('isValidEmail mirrors validateEmail', () => {
    expect(isValidEmail('jane@example.com')).toBe(true);
    expect(isValidEmail('jane')).toBe(false);
  });
});

describe('validateName', () => {
  it('accepts a non-empty name', () => {
    expect(validateName(' Jane Doe ')).toEqual({ ok: true, value: 'Jane Doe' });
  });

  it('rejects blank input', () => {
    const result = validateName('   ');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidNameError);
      expect(result.error.message).toBe('Name cannot be empty');
    }
  });
});
