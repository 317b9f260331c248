import { TelemetryError } from '../core/errors';

/**
 * The telemetry endpoint answers with `<token> <id>`. Anything but exactly
 * two tokens is rejected with the raw body in the message.
 */
export function parseTelemetryResponse(body: string): string {
  const tokens = body.trim().split(/\s+/);
  if (tokens.length !== 2) {
    throw new TelemetryError(`Server returned invalid response: ${body}`, body);
  }
  return tokens[1];
}

export function buildShareUrl(shareBase: URL, id: string): string {
  const url = new URL(shareBase.toString());
  url.searchParams.set('id', id);
  return url.toString();
}
