/** Raw ISP and location details returned by a server's IP lookup. */
export interface IPInfoResponse {
  ip?: string;
  hostname?: string;
  city?: string;
  region?: string;
  country?: string;
  loc?: string;
  org?: string;
  postal?: string;
  timezone?: string;
  readme?: string;
}

export interface IPInfoResult {
  processedString: string;
  rawIspInfo: IPInfoResponse;
}

export type ClientInfo = Omit<IPInfoResponse, 'readme'>;

export interface ServerInfo {
  readonly name: string;
  readonly url: string;
}

export interface Report {
  readonly timestamp: Date;
  readonly server: ServerInfo;
  readonly client: Readonly<ClientInfo>;
  readonly bytes_sent: number;
  readonly bytes_received: number;
  readonly ping: number;
  readonly jitter: number;
  readonly upload: number;
  readonly download: number;
  readonly share: string;
}

// A type alias rather than an interface so it satisfies csv-writer's record map
export type FlatReport = {
  timestamp: string;
  server_name: string;
  address: string;
  ping: number;
  jitter: number;
  download: number;
  upload: number;
  bytes_received: number;
  bytes_sent: number;
  share: string;
  ip: string;
};
