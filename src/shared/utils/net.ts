export function isIpv4(value: string): boolean {
  return parseIpv4(value) !== null;
}

export function parseIpv4(value: string): number | null {
  const parts = value.trim().split('.');
  if (parts.length !== 4) {
    return null;
  }
  let result = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) {
      return null;
    }
    const octet = Number(part);
    if (octet > 255) {
      return null;
    }
    result = ((result << 8) | octet) >>> 0;
  }
  return result;
}

export function formatIpv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join('.');
}
