import { createHash } from 'crypto';

/**
 * Normalizes a phone number to the format 254xxxxxxxxx
 * Handles inputs like: 0712345678, +254712345678, 254712345678
 * 
 * @param phoneNumber - The phone number in any format
 * @returns Normalized phone number in format 254xxxxxxxxx
 * @throws Error if the phone number format is invalid
 */
export function normalizePhoneNumber(phoneNumber: string): string {
  const cleaned = phoneNumber.replace(/[\s-]/g, '');
  const withoutPlus = cleaned.startsWith('+') ? cleaned.slice(1) : cleaned;

  if (withoutPlus.startsWith('254')) {
    return withoutPlus;
  } else if (withoutPlus.startsWith('0')) {
    return '254' + withoutPlus.slice(1);
  } else if (withoutPlus.length === 9) {
    return '254' + withoutPlus;
  } else {
    throw new Error(`Invalid phone number format: ${phoneNumber}`);
  }
}

/**
 * Strictly normalizes a Kenyan mobile number to +254xxxxxxxxx
 * Accepts 07.../01... (10 digits), 7.../1... (9 digits) or 254... (12 digits)
 *
 * @returns The canonical number, or null when the input is not a mobile number
 */
export function normalizeMobileNumber(input: string): string | null {
  const cleaned = input.trim().replace(/[\s-]/g, '').replace(/^\+/, '');

  if (!/^\d+$/.test(cleaned)) {
    return null;
  }

  let subscriber: string;
  if (cleaned.length === 10 && cleaned.startsWith('0')) {
    subscriber = cleaned.slice(1);
  } else if (cleaned.length === 9) {
    subscriber = cleaned;
  } else if (cleaned.length === 12 && cleaned.startsWith('254')) {
    subscriber = cleaned.slice(3);
  } else {
    return null;
  }

  // Safaricom/Airtel 7xx and the newer 1xx range
  if (!/^[17]\d{8}$/.test(subscriber)) {
    return null;
  }

  return `+254${subscriber}`;
}

/**
 * Payment provider wants 254xxxxxxxxx without the plus
 */
export function toProviderPhone(phone: string): string {
  return normalizePhoneNumber(phone);
}

/**
 * WhatsApp recipient id: digits with country code, no plus
 * Local 0-prefixed numbers are taken as Kenyan; other countries pass through
 */
export function toChatRecipient(phone: string): string {
  const cleaned = phone.trim().replace(/[\s-]/g, '').replace(/^\+/, '');
  if (cleaned.startsWith('0')) {
    return '254' + cleaned.slice(1);
  }
  return cleaned;
}

export function lastNineDigits(phone: string): string {
  return phone.replace(/\D/g, '').slice(-9);
}

/**
 * Same subscriber regardless of local, national or E.164 formatting
 */
export function phonesMatch(a: string, b: string): boolean {
  if (a === b) {
    return true;
  }
  const tailA = lastNineDigits(a);
  return tailA.length === 9 && tailA === lastNineDigits(b);
}

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/**
 * Formats a stored phone may have had when the provider hashed it
 */
export function phoneFormatVariants(storedPhone: string): string[] {
  const bare = storedPhone.replace(/^\+/, '');
  const last9 = lastNineDigits(storedPhone);
  const variants = [storedPhone, `+${bare}`, bare];

  if (last9.length === 9) {
    variants.push(last9, `0${last9}`, `254${last9}`, `+254${last9}`);
  }

  return Array.from(new Set(variants));
}

export function matchesHashedPhone(storedPhone: string, hashedPhone: string): boolean {
  const target = hashedPhone.trim().toLowerCase();
  if (!target) {
    return false;
  }
  return phoneFormatVariants(storedPhone).some((variant) => sha256Hex(variant) === target);
}
