export type TunnelStatus = 'connected' | 'disconnected';

/**
 * Persisted form of one tracked SSH forward.
 */
export interface TunnelRecord {
  host: string;
  port: number;
  /** Link exactly as the user supplied it; needed to reconnect */
  link: string;
  /** Pid of the forwarding process, null once terminated */
  processId: number | null;
  token: string;
}

/**
 * One row of `rjy list`.
 */
export interface TunnelListing {
  key: string;
  processId: number | null;
  status: TunnelStatus;
  link: string;
}

export function tunnelKey(host: string, port: number): string {
  return `${host}:${port}`;
}
