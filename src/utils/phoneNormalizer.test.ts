import { describe, it, expect } from 'vitest';
import {
  normalizePhoneNumber,
  normalizeMobileNumber,
  toProviderPhone,
  toChatRecipient,
  phonesMatch,
  phoneFormatVariants,
  matchesHashedPhone,
  sha256Hex,
} from './phoneNormalizer';

describe('normalizeMobileNumber', () => {
  it('canonicalizes local, national and international forms', () => {
    expect(normalizeMobileNumber('0712345678')).toBe('+254712345678');
    expect(normalizeMobileNumber('712345678')).toBe('+254712345678');
    expect(normalizeMobileNumber('254712345678')).toBe('+254712345678');
    expect(normalizeMobileNumber('+254 712-345-678')).toBe('+254712345678');
    expect(normalizeMobileNumber('0110345678')).toBe('+254110345678');
  });

  it('rejects numbers outside the mobile ranges or with the wrong length', () => {
    expect(normalizeMobileNumber('0212345678')).toBeNull();
    expect(normalizeMobileNumber('07123456')).toBeNull();
    expect(normalizeMobileNumber('2557123456789')).toBeNull();
    expect(normalizeMobileNumber('07l2345678')).toBeNull();
    expect(normalizeMobileNumber('')).toBeNull();
  });
});

describe('normalizePhoneNumber', () => {
  it('returns the 254 form without a plus', () => {
    expect(normalizePhoneNumber('+254712345678')).toBe('254712345678');
    expect(normalizePhoneNumber('0712345678')).toBe('254712345678');
    expect(toProviderPhone('+254712345678')).toBe('254712345678');
  });

  it('throws on unknown formats', () => {
    expect(() => normalizePhoneNumber('12345')).toThrow('Invalid phone number format: 12345');
  });
});

describe('toChatRecipient', () => {
  it('keeps the country code of any number and strips the plus', () => {
    expect(toChatRecipient('+447911123456')).toBe('447911123456');
    expect(toChatRecipient('254712345678')).toBe('254712345678');
    expect(toChatRecipient('0712 345-678')).toBe('254712345678');
  });
});

describe('phonesMatch', () => {
  it('matches on the last nine digits', () => {
    expect(phonesMatch('254708116809', '+254708116809')).toBe(true);
    expect(phonesMatch('0708116809', '254708116809')).toBe(true);
    expect(phonesMatch('254708116809', '254708116800')).toBe(false);
  });
});

describe('hashed phone matching', () => {
  it('lists the as-stored, plus, bare, local and national variants', () => {
    expect(phoneFormatVariants('254708116809')).toEqual([
      '254708116809',
      '+254708116809',
      '708116809',
      '0708116809',
    ]);
  });

  it('resolves a hash of any variant to the stored phone', () => {
    expect(matchesHashedPhone('254708116809', sha256Hex('0708116809'))).toBe(true);
    expect(matchesHashedPhone('254708116809', sha256Hex('+254708116809'))).toBe(true);
    expect(matchesHashedPhone('+254708116809', sha256Hex('254708116809').toUpperCase())).toBe(true);
  });

  it('does not match a different subscriber', () => {
    expect(matchesHashedPhone('254711111111', sha256Hex('0708116809'))).toBe(false);
    expect(matchesHashedPhone('254708116809', '')).toBe(false);
  });
});
