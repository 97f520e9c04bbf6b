/**
 * Typed reads from parsed request bodies and multipart fields. Validation has
 * already run; these only narrow `unknown` so handlers stay free of casts.
 */

export function readField(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null) return undefined;
  const value: unknown = Reflect.get(source, key);
  return value;
}

export function readString(source: unknown, key: string): string | undefined {
  const value = readField(source, key);
  return typeof value === 'string' ? value : undefined;
}

/** Form-style booleans: "true", "1", "yes", "on". */
export function readFlag(source: unknown, key: string): boolean {
  const value = readField(source, key);
  if (typeof value === 'boolean') return value;
  return typeof value === 'string' && /^(1|true|yes|on)$/i.test(value.trim());
}
