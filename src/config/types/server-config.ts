/**
 * A measurement server as it appears in a server list file. Endpoint paths
 * are relative to `server` unless they carry their own scheme.
 */
export interface ServerDefinition {
  id: number;
  name: string;
  server: string;
  dlURL: string;
  ulURL: string;
  pingURL: string;
  getIpURL: string;
  sponsorName?: string;
  sponsorURL?: string;
}
