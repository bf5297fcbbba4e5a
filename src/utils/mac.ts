/** Upper-case, colon separated. Input that is not 12 hex digits is returned trimmed and upper-cased. */
export function normalizeMac(mac: string): string {
  const hex = mac.toUpperCase().replace(/[^A-F0-9]/g, '');
  if (hex.length !== 12) {
    return mac.trim().toUpperCase();
  }
  return hex.replace(/(.{2})(?!$)/g, '$1:');
}

export function compareMac(mac1: string, mac2: string): boolean {
  return normalizeMac(mac1) === normalizeMac(mac2);
}

export function isValidMac(mac: string): boolean {
  const normalized = mac.replace(/[^a-fA-F0-9]/g, '');
  return normalized.length === 12 && /^[a-fA-F0-9]+$/.test(normalized);
}
