/**
 * Serializes a JSON value with object keys sorted, so two payloads that
 * differ only in key order produce the same string. PostgreSQL `jsonb`
 * does not preserve key order, so stored and incoming payloads are
 * compared in this form.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);

  return `{${entries.join(',')}}`;
}

export function samePayload(a: unknown, b: unknown): boolean {
  return canonicalJson(a) === canonicalJson(b);
}
