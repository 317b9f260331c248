/**
 * Converts a Mbps figure to a byte rate string. Only bytes/s, KB/s, MB/s and
 * GB/s are produced; a value exactly at the base stays in MB/s.
 */
export function humanizeMbps(mbps: number, useMebi: boolean): string {
  const base = useMebi ? 1024 : 1000;
  const val = mbps / 8;

  if (val < 1) {
    const kb = val * base;
    if (kb < 1) {
      return `${(kb * base).toFixed(2)} bytes/s`;
    }
    return `${kb.toFixed(2)} KB/s`;
  } else if (val > base) {
    return `${(val / base).toFixed(2)} GB/s`;
  }
  return `${val.toFixed(2)} MB/s`;
}

export function formatRate(mbps: number, bytes: boolean, useMebi: boolean): string {
  return bytes ? humanizeMbps(mbps, useMebi) : `${mbps.toFixed(2)} Mbps`;
}
