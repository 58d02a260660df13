export function stripTrailingPunctuation(value: string): string {
  return value.replace(/[),.!?;:]+$/g, '');
}

export function normalizeDomain(input: string): string | null {
  const raw = input.trim().toLowerCase().replace(/\.+$/, '');
  if (!raw) return null;

  try {
    const withProtocol = raw.includes('://') ? raw : `http://${raw}`;
    const parsed = new URL(withProtocol);
    const hostname = parsed.hostname.toLowerCase().replace(/\.+$/, '');
    if (!hostname) return null;
    return hostname;
  } catch {
    return null;
  }
}

export function stripWwwPrefix(hostname: string): string {
  return hostname.startsWith('www.') ? hostname.slice(4) : hostname;
}

export function isIpv4Host(hostname: string): boolean {
  const parts = hostname.split('.');
  if (parts.length !== 4) return false;

  return parts.every((part) => /^\d{1,3}$/.test(part) && Number(part) <= 255);
}
