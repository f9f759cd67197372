/**
 * Plain-object guard for parsed JSON, YAML and request bodies
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
