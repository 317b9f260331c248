import axios, { AxiosInstance } from 'axios';
import { TelemetryConfig, TelemetryExtra } from '../config/types';
import { IPInfoResult } from '../reporting/types';
import { TelemetryError, errorMessage } from '../core/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { USER_AGENT } from '../version';
import { buildShareUrl, parseTelemetryResponse } from './response';

export interface TelemetryPayload {
  ispInfo: IPInfoResult;
  download: number;
  upload: number;
  ping: number;
  jitter: number;
  /** Diagnostic log captured while testing the server */
  log: string;
  extra: TelemetryExtra;
}

export interface TelemetrySubmitter {
  /** Resolves to the share URL of the submitted result. */
  submit(payload: TelemetryPayload): Promise<string>;
}

export function buildTelemetryForm(payload: TelemetryPayload): FormData {
  const form = new FormData();
  form.append('ispinfo', JSON.stringify(payload.ispInfo));
  form.append('dl', payload.download.toFixed(2));
  form.append('ul', payload.upload.toFixed(2));
  form.append('ping', payload.ping.toFixed(2));
  form.append('jitter', payload.jitter.toFixed(2));
  form.append('log', payload.log);
  form.append('extra', JSON.stringify(payload.extra));
  return form;
}

export class TelemetryClient implements TelemetrySubmitter {
  private config: TelemetryConfig;
  private http: AxiosInstance;
  private logger: Logger;

  constructor(config: TelemetryConfig, http?: AxiosInstance, logger: Logger = defaultLogger) {
    this.config = config;
    this.logger = logger;
    this.http = http ?? axios.create({
      timeout: 30000,
      headers: { 'User-Agent': USER_AGENT }
    });
  }

  getSubmitUrl(): URL {
    return this.resolve(this.config.path);
  }

  getShareUrl(): URL {
    return this.resolve(this.config.share);
  }

  async submit(payload: TelemetryPayload): Promise<string> {
    let form: FormData;
    try {
      form = buildTelemetryForm(payload);
    } catch (error) {
      this.logger.debug(`Error creating telemetry form: ${errorMessage(error)}`);
      throw new TelemetryError(`Failed to encode telemetry form: ${errorMessage(error)}`);
    }

    const submitUrl = this.getSubmitUrl();
    const shareBase = this.getShareUrl();

    this.logger.debug(`📡 POST ${submitUrl.toString()}`);
    // axios derives the multipart Content-Type and boundary from the form
    const response = await this.http.post<string>(submitUrl.toString(), form, {
      headers: { 'User-Agent': USER_AGENT },
      responseType: 'text'
    });

    const body = typeof response.data === 'string' ? response.data : String(response.data);
    return buildShareUrl(shareBase, parseTelemetryResponse(body));
  }

  private resolve(path: string | undefined): URL {
    if (!this.config.server) {
      throw new TelemetryError('Telemetry server is not configured');
    }
    return new URL(path ?? '', this.config.server);
  }
}
