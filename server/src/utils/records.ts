/**
 * Narrows parsed JSON or a driver row to a plain field map
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
