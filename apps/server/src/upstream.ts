import dgram from 'dgram';
import net from 'net';
import { ConfigurationError } from './errors.js';

export const DEFAULT_PORT = 53;
export const DEFAULT_UPSTREAM_TIMEOUT_MS = 5000;

export type Protocol = 'udp' | 'tcp';

export interface UpstreamEndpoint {
  host: string;
  port: number;
}

/**
 * Sends one DNS message to an endpoint and resolves with the raw reply.
 * Rejects on timeout or socket errors.
 */
export interface UpstreamTransport {
  exchange(message: Buffer, endpoint: UpstreamEndpoint, protocol: Protocol, timeoutMs: number): Promise<Buffer>;
}

export function parsePort(value: string | number, source: string): number {
  const port = typeof value === 'number' ? value : /^\d+$/.test(value.trim()) ? Number(value) : NaN;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`Invalid port ${JSON.stringify(value)} in ${source}`);
  }
  return port;
}

/**
 * Parses `host`, `host:port`, a bare IPv6 address or `[ipv6]:port`.
 */
export function parseUpstream(address: string): UpstreamEndpoint {
  const value = address.trim();

  const bracketed = /^\[([^\]]+)\](?::(.*))?$/.exec(value);
  if (bracketed) {
    const [, host = '', port] = bracketed;
    return { host, port: port === undefined ? DEFAULT_PORT : parsePort(port, `upstream "${address}"`) };
  }

  const colons = value.split(':').length - 1;
  if (colons > 1) {
    return { host: value, port: DEFAULT_PORT };
  }

  const [host = '', port] = value.split(':');
  if (host === '') {
    throw new ConfigurationError(`Upstream "${address}" has no host`);
  }
  return { host, port: port === undefined ? DEFAULT_PORT : parsePort(port, `upstream "${address}"`) };
}

/** Splits a comma-separated upstream list, dropping empty entries. */
export function parseUpstreamList(addresses: string): UpstreamEndpoint[] {
  return addresses
    .split(',')
    .map((address) => address.trim())
    .filter((address) => address.length > 0)
    .map(parseUpstream);
}

export function formatEndpoint(endpoint: UpstreamEndpoint): string {
  return net.isIPv6(endpoint.host) ? `[${endpoint.host}]:${endpoint.port}` : `${endpoint.host}:${endpoint.port}`;
}

function exchangeTCP(message: Buffer, endpoint: UpstreamEndpoint, timeoutMs: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: endpoint.host, port: endpoint.port });

    const timeout = setTimeout(() => {
      socket.destroy();
      reject(new Error('DNS query timeout'));
    }, timeoutMs);

    // TCP DNS messages have a 2-byte length prefix
    const lengthPrefix = Buffer.allocUnsafe(2);
    lengthPrefix.writeUInt16BE(message.length, 0);
    const tcpMessage = Buffer.concat([lengthPrefix, message]);

    let responseLength: number | null = null;
    let responseBuffer: Buffer = Buffer.alloc(0);

    socket.on('data', (data: Buffer) => {
      responseBuffer = Buffer.concat([responseBuffer, data]);

      if (responseLength === null && responseBuffer.length >= 2) {
        responseLength = responseBuffer.readUInt16BE(0);
      }

      if (responseLength !== null && responseBuffer.length >= responseLength + 2) {
        clearTimeout(timeout);
        socket.destroy();
        resolve(responseBuffer.subarray(2, responseLength + 2));
      }
    });

    socket.on('error', (err) => {
      clearTimeout(timeout);
      socket.destroy();
      reject(err);
    });

    socket.on('end', () => {
      clearTimeout(timeout);
      reject(new Error('Connection closed before a complete response'));
    });

    socket.on('connect', () => {
      socket.write(tcpMessage);
    });
  });
}

function exchangeUDP(message: Buffer, endpoint: UpstreamEndpoint, timeoutMs: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const client = dgram.createSocket(net.isIPv6(endpoint.host) ? 'udp6' : 'udp4');
    const timeout = setTimeout(() => {
      client.close();
      reject(new Error('DNS query timeout'));
    }, timeoutMs);

    client.on('message', (response) => {
      clearTimeout(timeout);
      client.close();
      resolve(response);
    });

    client.on('error', (err) => {
      clearTimeout(timeout);
      client.close();
      reject(err);
    });

    client.send(message, endpoint.port, endpoint.host, (err) => {
      if (err) {
        clearTimeout(timeout);
        client.close();
        reject(err);
      }
    });
  });
}

export const socketTransport: UpstreamTransport = {
  exchange(message, endpoint, protocol, timeoutMs) {
    return protocol === 'tcp' ? exchangeTCP(message, endpoint, timeoutMs) : exchangeUDP(message, endpoint, timeoutMs);
  },
};
