import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import dgram from 'dgram';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import * as dnsPacket from 'dns-packet';
import { DNSServer, parsePortSpec } from '../src/dns-server.js';
import { ConfigurationError, ValidationError } from '../src/errors.js';
import { logger } from '../src/logger.js';
import { RecordsResolver, type RecordStore } from '../src/resolver.js';
import { ZoneRecord } from '../src/record.js';
import { SharedStore } from '../src/shared-store.js';
import { Zone } from '../src/zone.js';
import {
  FakeTransport,
  createDNSQuery,
  createUpstreamReply,
  queryTCP,
  queryUDP,
  rcodeOf,
  startUdpUpstream,
  type LoopbackUpstream,
} from './test-server-helper.js';

const SERIAL = 1700000000;

const zones = [
  new Zone({ host: 'example.com', type: 'SOA', answer: ['ns1.example.com', 'admin.example.com'] }),
  new Zone({ host: 'example.com', type: 'NS', answer: 'ns1.example.com' }),
  new Zone({ host: 'www.example.com', type: 'A', answer: '1.2.3.4' }),
  new Zone({ host: 'example.com', type: 'MX', answer: ['mail.example.com', 5] }),
];

async function ask(server: DNSServer, name: string, type: string, flags?: number): Promise<dnsPacket.DecodedPacket> {
  const response = await server.handleQuery(createDNSQuery(name, type, 0x1234, flags), 'udp');
  if (!response) {
    throw new Error(`No response for ${name} ${type}`);
  }
  return dnsPacket.decode(response);
}

function rcodeIn(packet: dnsPacket.DecodedPacket): number {
  return (packet.flags ?? 0) & 0x0f;
}

function flagSet(packet: dnsPacket.DecodedPacket, flag: number): boolean {
  return ((packet.flags ?? 0) & flag) !== 0;
}

describe('DNSServer', () => {
  describe('handleQuery', () => {
    const transport = new FakeTransport((message) => createUpstreamReply(message, '9.9.9.9'));
    const server = new DNSServer({ zones, upstream: '10.0.0.1', transport, serial: SERIAL, ports: 0 });

    afterEach(() => {
      transport.calls.length = 0;
    });

    it('should answer local records authoritatively', async () => {
      const response = await ask(server, 'www.example.com', 'A');

      expect(response.type).toBe('response');
      expect(response.id).toBe(0x1234);
      expect(flagSet(response, dnsPacket.AUTHORITATIVE_ANSWER)).toBe(true);
      expect(response.answers).toHaveLength(1);
      expect(response.answers?.[0]).toMatchObject({ name: 'www.example.com', type: 'A', ttl: 300, data: '1.2.3.4' });
      expect(transport.calls).toHaveLength(0);
    });

    it('should answer MX queries with the exchange and preference', async () => {
      const response = await ask(server, 'example.com', 'MX');

      expect(response.answers?.[0]).toMatchObject({
        type: 'MX',
        data: { exchange: 'mail.example.com', preference: 5 },
      });
    });

    it('should answer ANY queries with every record of the name', async () => {
      const response = await ask(server, 'example.com', 'ANY');

      expect(response.answers?.map((answer) => answer.type)).toEqual(['SOA', 'NS', 'MX']);
    });

    it('should return the SOA with NXDOMAIN for unknown names inside a zone', async () => {
      const response = await ask(server, 'missing.example.com', 'A');

      expect(rcodeIn(response)).toBe(3);
      expect(flagSet(response, dnsPacket.AUTHORITATIVE_ANSWER)).toBe(true);
      expect(response.answers).toEqual([]);
      expect(response.authorities?.[0]).toMatchObject({
        name: 'example.com',
        type: 'SOA',
        ttl: 86400,
        data: {
          mname: 'ns1.example.com',
          rname: 'admin.example.com',
          serial: SERIAL,
          refresh: 3600,
          retry: 10800,
          expire: 86400,
          minimum: 3600,
        },
      });
      expect(transport.calls).toHaveLength(0);
    });

    it('should return the SOA with NOERROR when only the type is missing', async () => {
      const query = createDNSQuery('www.example.com', 'AAAA');
      const response = await server.handleQuery(query, 'udp');

      expect(response && rcodeOf(response)).toBe(0);
      const decoded = dnsPacket.decode(response ?? Buffer.alloc(0));
      expect(decoded.answers).toEqual([]);
      expect(decoded.authorities?.[0]).toMatchObject({ name: 'example.com', type: 'SOA' });
    });

    it('should relay upstream replies for names outside every zone', async () => {
      const query = createDNSQuery('example.org', 'A');

      const response = await server.handleQuery(query, 'udp');

      expect(transport.hosts).toEqual(['10.0.0.1']);
      expect(response).toEqual(createUpstreamReply(query, '9.9.9.9'));
    });

    it('should reply SERVFAIL when the upstream fails', async () => {
      const failing = new DNSServer({
        upstream: '10.0.0.1',
        transport: new FakeTransport(() => {
          throw new Error('DNS query timeout');
        }),
        ports: 0,
      });

      const response = await failing.handleQuery(createDNSQuery('example.org', 'A', 0x4321), 'udp');

      expect(response).not.toBeNull();
      expect(response && rcodeOf(response)).toBe(2);
      expect(response && response.readUInt16BE(0)).toBe(0x4321);
    });

    it('should reply NXDOMAIN without an upstream', async () => {
      const local = new DNSServer({ zones, upstream: null, ports: 0 });

      const response = await local.handleQuery(createDNSQuery('example.org', 'A'), 'udp');

      expect(response && rcodeOf(response)).toBe(3);
      expect(dnsPacket.decode(response ?? Buffer.alloc(0)).authorities).toEqual([]);
    });

    it('should reply FORMERR to queries without a question', async () => {
      const query = dnsPacket.encode({ type: 'query', id: 7, flags: dnsPacket.RECURSION_DESIRED, questions: [] });

      const response = await server.handleQuery(query, 'udp');

      expect(response && rcodeOf(response)).toBe(1);
      expect(response && response.readUInt16BE(0)).toBe(7);
    });

    it('should drop messages that cannot be decoded', async () => {
      await expect(server.handleQuery(Buffer.from([0x12, 0x34, 0x01]), 'udp')).resolves.toBeNull();
    });

    it('should drop responses', async () => {
      const reply = createUpstreamReply(createDNSQuery('example.org', 'A'), '9.9.9.9');
      await expect(server.handleQuery(reply, 'udp')).resolves.toBeNull();
    });

    it('should log answered queries at debug level only', async () => {
      const info = vi.spyOn(logger, 'info');
      const debug = vi.spyOn(logger, 'debug');
      try {
        await ask(server, 'www.example.com', 'A');
        await ask(server, 'missing.example.com', 'A');
        await ask(server, 'example.org', 'A');

        expect(info).not.toHaveBeenCalled();
        expect(debug.mock.calls.map(([message]) => message)).toEqual([
          'Found local records',
          'Found higher level SOA record',
          'Forwarded query',
          'Proxied query',
        ]);
      } finally {
        info.mockRestore();
        debug.mockRestore();
      }
    });

    it('should copy RD and always set RA', async () => {
      const withRd = await ask(server, 'www.example.com', 'A');
      const withoutRd = await ask(server, 'www.example.com', 'A', 0);

      expect(flagSet(withRd, dnsPacket.RECURSION_DESIRED)).toBe(true);
      expect(flagSet(withRd, dnsPacket.RECURSION_AVAILABLE)).toBe(true);
      expect(flagSet(withoutRd, dnsPacket.RECURSION_DESIRED)).toBe(false);
      expect(flagSet(withoutRd, dnsPacket.RECURSION_AVAILABLE)).toBe(true);
    });
  });

  describe('records', () => {
    it('should serve a record added at runtime', async () => {
      const server = new DNSServer({ upstream: null, ports: 0 });

      const record = await server.addRecord(new Zone({ host: 'new.example.com', type: 'A', answer: '5.6.7.8' }));
      const response = await ask(server, 'new.example.com', 'A');

      expect(record.name).toBe('new.example.com');
      expect(response.answers?.[0]).toMatchObject({ data: '5.6.7.8' });
    });

    it('should keep the TTL of resource records added directly', async () => {
      const server = new DNSServer({ upstream: null, ports: 0 });

      await server.addResourceRecord({ name: 'raw.example.com', type: 'A', ttl: 42, data: '1.1.1.1' });
      const response = await ask(server, 'raw.example.com', 'A');

      expect(response.answers?.[0]).toMatchObject({ ttl: 42, data: '1.1.1.1' });
    });

    it('should not lose records added concurrently', async () => {
      const server = new DNSServer({ zones, upstream: null, ports: 0 });

      await Promise.all(
        Array.from({ length: 20 }, (_, index) =>
          server.addRecord(new Zone({ host: `host${index}.example.com`, type: 'A', answer: `10.0.0.${index}` })),
        ),
      );

      const records = await server.getRecords();
      expect(records).toHaveLength(zones.length + 20);
    });

    it('should replace every record', async () => {
      const server = new DNSServer({ zones, upstream: null, ports: 0 });

      await server.setRecords([new Zone({ host: 'only.example.net', type: 'TXT', answer: 'hello' })]);

      const records = await server.getRecords();
      expect(records.map((record) => record.name)).toEqual(['only.example.net']);
      expect(rcodeIn(await ask(server, 'www.example.com', 'A'))).toBe(3);
    });

    it('should keep the current records when a replacement is invalid', async () => {
      const server = new DNSServer({ zones, upstream: null, ports: 0 });

      await expect(
        server.setRecords([
          new Zone({ host: 'ok.example.com', type: 'A', answer: '1.1.1.1' }),
          new Zone({ host: 'bad.example.com', type: 'A', answer: 'not-an-ip' }),
        ]),
      ).rejects.toBeInstanceOf(ValidationError);

      expect(await server.getRecords()).toHaveLength(zones.length);
    });

    it('should serve from a store shared with the caller', async () => {
      const store: RecordStore = new SharedStore<readonly ZoneRecord[]>([]);
      const server = new DNSServer({ store, upstream: null, ports: 0 });

      await store.update((records) => [
        ...records,
        ZoneRecord.fromZone(new Zone({ host: 'shared.example.com', type: 'A', answer: '7.7.7.7' }), { serial: 1 }),
      ]);

      expect(server.records).toBe(store);
      expect((await ask(server, 'shared.example.com', 'A')).answers?.[0]).toMatchObject({ data: '7.7.7.7' });
    });

    it('should use the injected serial for completed SOA answers', async () => {
      const server = new DNSServer({ zones, upstream: null, serial: 42, ports: 0 });

      const response = await ask(server, 'example.com', 'SOA');

      expect(response.answers?.[0]).toMatchObject({ data: { serial: 42 } });
    });
  });

  describe('configuration', () => {
    it('should listen on UDP and TCP port 53 by default', () => {
      const server = new DNSServer({ upstream: null });

      expect(server.getPorts()).toEqual([
        { port: 53, protocol: 'udp' },
        { port: 53, protocol: 'tcp' },
      ]);
      expect(server.port).toBe(53);
      expect(server.isRunning).toBe(false);
    });

    it('should serve local records only when the upstream is empty', () => {
      expect(new DNSServer({ upstream: '', ports: 0 }).resolver).toBeInstanceOf(RecordsResolver);
    });

    it('should reject zones and a store together', () => {
      expect(
        () => new DNSServer({ zones, store: new SharedStore<readonly ZoneRecord[]>([]), upstream: null, ports: 0 }),
      ).toThrow(ConfigurationError);
    });

    it('should reject invalid zones at construction', () => {
      expect(
        () => new DNSServer({ zones: [new Zone({ host: 'x.example.com', type: 'AAAA', answer: 'nope' })], ports: 0 }),
      ).toThrow(ValidationError);
    });

    it('should reject an invalid upstream', () => {
      expect(() => new DNSServer({ upstream: '1.1.1.1:dns', ports: 0 })).toThrow(ConfigurationError);
    });

    it('should load zones from a TOML file', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'dnserver-'));
      try {
        const file = join(dir, 'zones.toml');
        await writeFile(
          file,
          ["[[zones]]", "host = 'file.example.com'", "type = 'A'", "answer = '4.3.2.1'", ''].join('\n'),
        );

        const server = await DNSServer.fromZonesFile(file, { upstream: null, ports: 0 });

        expect((await ask(server, 'file.example.com', 'A')).answers?.[0]).toMatchObject({ data: '4.3.2.1' });
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });
  });
});

describe('parsePortSpec', () => {
  it('should expand ports without a protocol to UDP and TCP', () => {
    expect(parsePortSpec([5353, { port: 5354, protocol: 'tcp' }, 5353])).toEqual([
      { port: 5353, protocol: 'udp' },
      { port: 5353, protocol: 'tcp' },
      { port: 5354, protocol: 'tcp' },
    ]);
  });

  it('should accept a single binding', () => {
    expect(parsePortSpec({ port: 8053, protocol: 'udp' })).toEqual([{ port: 8053, protocol: 'udp' }]);
  });

  it('should reject empty lists and unknown protocols', () => {
    expect(() => parsePortSpec([])).toThrow('At least one port is required');
    expect(() => parsePortSpec({ port: 1, protocol: JSON.parse('"sctp"') })).toThrow('Invalid protocol "sctp" for port 1');
  });
});

describe('DNSServer listeners', () => {
  let upstream: LoopbackUpstream;
  let server: DNSServer;
  let udpPort: number;
  let tcpPort: number;

  beforeAll(async () => {
    upstream = await startUdpUpstream('10.1.1.1');
    server = new DNSServer({
      zones,
      upstream: `127.0.0.1:${upstream.port}`,
      bindAddress: '127.0.0.1',
      ports: [
        { port: 0, protocol: 'udp' },
        { port: 0, protocol: 'tcp' },
      ],
    });
    await server.start();
    const [udp, tcp] = server.getPorts();
    udpPort = udp.port;
    tcpPort = tcp.port;
  });

  afterAll(async () => {
    await server.stop();
    await upstream.close();
  });

  it('should report the bound ports', () => {
    expect(server.isRunning).toBe(true);
    expect(udpPort).toBeGreaterThan(0);
    expect(tcpPort).toBeGreaterThan(0);
    expect(server.port).toBe(udpPort);
  });

  it('should answer local records over UDP', async () => {
    const response = dnsPacket.decode(await queryUDP(udpPort, createDNSQuery('www.example.com', 'A')));

    expect(response.answers?.[0]).toMatchObject({ name: 'www.example.com', data: '1.2.3.4' });
  });

  it('should answer local records over TCP', async () => {
    const response = dnsPacket.decode(await queryTCP(tcpPort, createDNSQuery('www.example.com', 'A', 0x5555)));

    expect(response.id).toBe(0x5555);
    expect(response.answers?.[0]).toMatchObject({ name: 'www.example.com', data: '1.2.3.4' });
  });

  it('should forward other names to the upstream', async () => {
    const response = dnsPacket.decode(await queryUDP(udpPort, createDNSQuery('example.org', 'A')));

    expect(response.answers?.[0]).toMatchObject({ name: 'example.org', data: '10.1.1.1' });
  });

  it('should keep serving after an undecodable datagram', async () => {
    const garbage = queryUDP(udpPort, Buffer.from([0xff]));
    await expect(garbage).rejects.toThrow('DNS query timeout');

    const response = dnsPacket.decode(await queryUDP(udpPort, createDNSQuery('www.example.com', 'A')));
    expect(response.answers).toHaveLength(1);
  });

  it('should fail to start on a port in use and release what it bound', async () => {
    const clash = new DNSServer({
      upstream: null,
      bindAddress: '127.0.0.1',
      ports: [
        { port: 0, protocol: 'udp' },
        { port: tcpPort, protocol: 'tcp' },
      ],
    });

    await expect(clash.start()).rejects.toThrow();
    expect(clash.isRunning).toBe(false);
  });

  it('should drop replies that finish after the server stopped', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let forwarded: () => void = () => {};
    const inFlight = new Promise<void>((resolve) => {
      forwarded = resolve;
    });
    const held = new DNSServer({
      upstream: '10.0.0.1',
      transport: new FakeTransport(async (message) => {
        forwarded();
        await gate;
        return createUpstreamReply(message, '9.9.9.9');
      }),
      bindAddress: '127.0.0.1',
      ports: { port: 0, protocol: 'udp' },
    });
    const unhandled: unknown[] = [];
    const onUnhandled = (reason: unknown) => unhandled.push(reason);
    process.on('unhandledRejection', onUnhandled);
    const client = dgram.createSocket('udp4');
    try {
      await held.start();
      client.send(createDNSQuery('slow.example.org', 'A'), held.port, '127.0.0.1');
      await inFlight;

      await held.stop();
      release();
      await new Promise((resolve) => setTimeout(resolve, 50));

      expect(unhandled).toEqual([]);
      expect(held.isRunning).toBe(false);
    } finally {
      process.off('unhandledRejection', onUnhandled);
      client.close();
    }
  });

  it('should stop listening', async () => {
    const other = new DNSServer({ upstream: null, bindAddress: '127.0.0.1', ports: { port: 0, protocol: 'udp' } });
    await other.start();
    expect(other.isRunning).toBe(true);

    await other.stop();

    expect(other.isRunning).toBe(false);
    expect(other.getPorts()).toEqual([{ port: 0, protocol: 'udp' }]);
  });
});
