/**
 * Normalize a mobile-money number to digits with its country code,
 * e.g. "0712 345 678" -> "255712345678" for country code 255.
 * Returns null when the input cannot be a valid MSISDN.
 */
export function normalizePhoneNumber(input: string, countryCode: string): string | null {
  let s = input.trim().replace(/[\s().-]/g, '');
  if (!s) return null;

  if (s.startsWith('+')) s = s.slice(1);
  else if (s.startsWith('00')) s = s.slice(2);
  else if (s.startsWith('0')) s = countryCode + s.slice(1);
  else if (s.length === 9) s = countryCode + s;

  if (!/^\d{10,15}$/.test(s)) return null;
  if (s.startsWith('0')) return null;
  return s;
}
