import { IPInfoResponse, IPInfoResult } from '../../reporting/types';

const RAW_FIELDS = ['ip', 'hostname', 'city', 'region', 'country', 'loc', 'org', 'postal', 'timezone', 'readme'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a getIP response. Servers answer with an empty string instead
 * of an object when the ISP lookup itself failed; that becomes `{}`.
 */
export function parseIPInfo(data: unknown): IPInfoResult {
  const body = typeof data === 'string' ? safeParse(data) : data;
  if (!isRecord(body) || typeof body.processedString !== 'string') {
    throw new Error('Invalid IP info response');
  }

  const rawIspInfo: IPInfoResponse = {};
  if (isRecord(body.rawIspInfo)) {
    for (const field of RAW_FIELDS) {
      const value = body.rawIspInfo[field];
      if (typeof value === 'string') {
        rawIspInfo[field] = value;
      }
    }
  }

  return { processedString: body.processedString, rawIspInfo };
}

function safeParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`IP info response is not JSON: ${text.slice(0, 200)}`);
  }
}
