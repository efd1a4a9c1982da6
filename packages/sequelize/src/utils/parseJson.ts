/**
 * Decoded value of a JSON report column. Depending on dialect and driver the
 * column arrives decoded or as text; text is decoded here, anything else is
 * returned unchanged.
 */
export function parseJson(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const decoded: unknown = JSON.parse(value);
  return decoded;
}
