import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import dgram from 'dgram';
import * as dnsPacket from 'dns-packet';
import { ConfigurationError } from '../src/errors.js';
import { formatEndpoint, parsePort, parseUpstream, parseUpstreamList, socketTransport } from '../src/upstream.js';
import { createDNSQuery, startTcpUpstream, startUdpUpstream, type LoopbackUpstream } from './test-server-helper.js';

describe('parseUpstream', () => {
  it('should default to port 53', () => {
    expect(parseUpstream('1.1.1.1')).toEqual({ host: '1.1.1.1', port: 53 });
    expect(parseUpstream('dns.example.net')).toEqual({ host: 'dns.example.net', port: 53 });
  });

  it('should read an explicit port', () => {
    expect(parseUpstream('8.8.8.8:5353')).toEqual({ host: '8.8.8.8', port: 5353 });
    expect(parseUpstream(' 8.8.8.8:54 ')).toEqual({ host: '8.8.8.8', port: 54 });
  });

  it('should accept IPv6 addresses with and without brackets', () => {
    expect(parseUpstream('2001:db8::1')).toEqual({ host: '2001:db8::1', port: 53 });
    expect(parseUpstream('[2001:db8::1]')).toEqual({ host: '2001:db8::1', port: 53 });
    expect(parseUpstream('[2001:db8::1]:5353')).toEqual({ host: '2001:db8::1', port: 5353 });
  });

  it('should reject bad ports', () => {
    expect(() => parseUpstream('1.1.1.1:dns')).toThrow(ConfigurationError);
    expect(() => parseUpstream('1.1.1.1:70000')).toThrow('Invalid port "70000" in upstream "1.1.1.1:70000"');
  });

  it('should reject a missing host', () => {
    expect(() => parseUpstream(':53')).toThrow('Upstream ":53" has no host');
  });
});

describe('parseUpstreamList', () => {
  it('should split on commas and skip empty entries', () => {
    expect(parseUpstreamList('1.1.1.1, 8.8.8.8:5353,,')).toEqual([
      { host: '1.1.1.1', port: 53 },
      { host: '8.8.8.8', port: 5353 },
    ]);
    expect(parseUpstreamList('')).toEqual([]);
  });
});

describe('parsePort', () => {
  it('should accept numbers and numeric strings', () => {
    expect(parsePort(0, 'test')).toBe(0);
    expect(parsePort('8053', 'test')).toBe(8053);
  });

  it('should reject values out of range', () => {
    expect(() => parsePort(-1, 'test')).toThrow('Invalid port -1 in test');
    expect(() => parsePort(1.5, 'test')).toThrow(ConfigurationError);
  });
});

describe('formatEndpoint', () => {
  it('should bracket IPv6 hosts', () => {
    expect(formatEndpoint({ host: '::1', port: 53 })).toBe('[::1]:53');
    expect(formatEndpoint({ host: '127.0.0.1', port: 5353 })).toBe('127.0.0.1:5353');
  });
});

describe('socketTransport', () => {
  let udp: LoopbackUpstream;
  let tcp: LoopbackUpstream;

  beforeAll(async () => {
    udp = await startUdpUpstream('10.1.1.1');
    tcp = await startTcpUpstream('10.2.2.2');
  });

  afterAll(async () => {
    await udp.close();
    await tcp.close();
  });

  it('should exchange a query over UDP', async () => {
    const query = createDNSQuery('udp.example.org', 'A', 0x0101);

    const reply = await socketTransport.exchange(query, { host: '127.0.0.1', port: udp.port }, 'udp', 2000);

    const decoded = dnsPacket.decode(reply);
    expect(decoded.id).toBe(0x0101);
    expect(decoded.answers?.[0]).toMatchObject({ name: 'udp.example.org', data: '10.1.1.1' });
  });

  it('should exchange a length-prefixed query over TCP', async () => {
    const query = createDNSQuery('tcp.example.org', 'A', 0x0202);

    const reply = await socketTransport.exchange(query, { host: '127.0.0.1', port: tcp.port }, 'tcp', 2000);

    const decoded = dnsPacket.decode(reply);
    expect(decoded.id).toBe(0x0202);
    expect(decoded.answers?.[0]).toMatchObject({ name: 'tcp.example.org', data: '10.2.2.2' });
  });

  it('should time out when nothing answers', async () => {
    const silent = dgram.createSocket('udp4');
    await new Promise<void>((resolve) => silent.bind(0, '127.0.0.1', () => resolve()));
    try {
      await expect(
        socketTransport.exchange(
          createDNSQuery('slow.example.org', 'A'),
          { host: '127.0.0.1', port: silent.address().port },
          'udp',
          100,
        ),
      ).rejects.toThrow('DNS query timeout');
    } finally {
      silent.close();
    }
  });
});
