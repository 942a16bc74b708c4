/**
 * Device Info
 * Opaque metadata sent by the uploading device (OS, model, app version...).
 * Only JSON objects are kept; anything else is reported as malformed and
 * treated as absent.
 */
export type DeviceInfo = Readonly<Record<string, unknown>>;

export type DeviceInfoParseResult =
  | { readonly status: 'absent' }
  | { readonly status: 'parsed'; readonly value: DeviceInfo }
  | { readonly status: 'malformed'; readonly reason: string };

export function parseDeviceInfo(raw: string | undefined | null): DeviceInfoParseResult {
  if (raw === undefined || raw === null || raw.trim().length === 0) {
    return { status: 'absent' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return {
      status: 'malformed',
      reason: error instanceof Error ? error.message : 'Invalid JSON',
    };
  }

  if (!isPlainObject(parsed)) {
    return { status: 'malformed', reason: 'Expected a JSON object' };
  }

  return { status: 'parsed', value: parsed };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
