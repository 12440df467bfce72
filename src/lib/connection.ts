import { NotConnectedError } from './errors.js';

export interface Connection {
  cspServer: string;
  vmcServer: string;
  orgId: string;
  headers: Record<string, string>;
}

let current: Connection | undefined;

export function setConnection(connection: Connection): void {
  current = connection;
}

export function getConnection(): Connection {
  if (!current) throw new NotConnectedError();
  return current;
}

export function isConnected(): boolean {
  return current !== undefined;
}

export function clearConnection(): void {
  current = undefined;
}
