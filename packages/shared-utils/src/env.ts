export type EnvSource = Record<string, string | undefined>;

export function env(key: string, source: EnvSource = process.env): string | undefined {
  const raw = source[key];
  if (raw === undefined) return undefined;

  const normalized = raw.trim();
  return normalized.length > 0 ? normalized : undefined;
}

export function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (raw === undefined) return defaultValue;

  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }
  return defaultValue;
}
