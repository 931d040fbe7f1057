import { InvalidArgumentError } from 'commander';

export const DEFAULT_SERVER_URL = 'http://127.0.0.1:8787';
export const DEFAULT_POLL_INTERVAL_MS = 600;

/**
 * --server wins over METADATA_SERVER_URL, which wins over the local default.
 */
export function resolveServerUrl(option?: string, env: NodeJS.ProcessEnv = process.env): string {
  const url = option?.trim() || env.METADATA_SERVER_URL?.trim() || DEFAULT_SERVER_URL;
  return url.replace(/\/+$/, '');
}

export function parseInterval(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError(`Invalid interval: ${value}. Use a positive number of milliseconds.`);
  }
  return ms;
}
