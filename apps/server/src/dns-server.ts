import dgram from 'dgram';
import net from 'net';
import * as dnsPacket from 'dns-packet';
import { ConfigurationError, UpstreamError } from './errors.js';
import { logger, toError } from './logger.js';
import { recordDNSQuery } from './otel-metrics.js';
import { ZoneRecord, defaultSerial, type ResourceAnswer } from './record.js';
import {
  RecordsResolver,
  RoundRobinResolver,
  createProxyResolvers,
  createResolver,
  type DNSRequest,
  type RecordStore,
  type Resolution,
  type Resolver,
  type ResolverSpec,
} from './resolver.js';
import { SharedStore } from './shared-store.js';
import { DEFAULT_PORT, parsePort, type Protocol, type UpstreamTransport } from './upstream.js';
import type { Zone } from './zone.js';
import { loadZonesFile } from './zones-file.js';

export const DEFAULT_UPSTREAM = '1.1.1.1';
export const DEFAULT_BIND_ADDRESS = '0.0.0.0';

const RCODE = {
  NOERROR: 0,
  FORMERR: 1,
  SERVFAIL: 2,
  NXDOMAIN: 3,
} as const;

/** A port with no protocol listens on both UDP and TCP. */
export interface PortBinding {
  port: number;
  protocol?: Protocol;
}

export type PortSpec = number | PortBinding | ReadonlyArray<number | PortBinding>;

export interface BoundPort {
  port: number;
  protocol: Protocol;
}

export interface ListenOptions {
  ports?: PortSpec;
  bindAddress?: string;
}

interface Listener {
  binding: BoundPort;
  udp: dgram.Socket | null;
  tcp: net.Server | null;
  sockets: Set<net.Socket>;
  boundPort: number | null;
}

function isPortList(spec: PortSpec): spec is ReadonlyArray<number | PortBinding> {
  return Array.isArray(spec);
}

export function parsePortSpec(spec: PortSpec = DEFAULT_PORT): BoundPort[] {
  const entries = isPortList(spec) ? spec : [spec];
  const bindings: BoundPort[] = [];
  for (const entry of entries) {
    const binding: PortBinding = typeof entry === 'number' ? { port: entry } : entry;
    const port = parsePort(binding.port, 'port configuration');
    if (binding.protocol !== undefined && binding.protocol !== 'udp' && binding.protocol !== 'tcp') {
      throw new ConfigurationError(`Invalid protocol ${JSON.stringify(binding.protocol)} for port ${port}`);
    }
    const protocols: Protocol[] = binding.protocol ? [binding.protocol] : ['udp', 'tcp'];
    for (const protocol of protocols) {
      if (!bindings.some((existing) => existing.port === port && existing.protocol === protocol)) {
        bindings.push({ port, protocol });
      }
    }
  }
  if (bindings.length === 0) {
    throw new ConfigurationError('At least one port is required');
  }
  return bindings;
}

function resultOf(resolution: Resolution): string {
  switch (resolution.kind) {
    case 'answer':
      return 'local';
    case 'authority':
      return resolution.nameExists ? 'nodata' : 'nxdomain';
    case 'forwarded':
      return 'forwarded';
    case 'not-found':
      return 'nxdomain';
  }
}

/**
 * UDP and TCP listeners in front of a resolver. Each query is decoded,
 * resolved and encoded on its own; a failing query never stops the
 * listeners.
 */
export class BaseDNSServer {
  readonly resolver: Resolver;
  protected readonly bindAddress: string;
  private readonly listeners: Listener[];

  constructor(spec: ResolverSpec, options: ListenOptions = {}) {
    this.resolver = createResolver(spec);
    this.bindAddress = options.bindAddress ?? DEFAULT_BIND_ADDRESS;
    this.listeners = parsePortSpec(options.ports).map((binding) => ({
      binding,
      udp: null,
      tcp: null,
      sockets: new Set(),
      boundPort: null,
    }));
  }

  get isRunning(): boolean {
    return this.listeners.some((listener) => listener.boundPort !== null);
  }

  /** First port, the actual one once started (port 0 binds an ephemeral port). */
  get port(): number {
    const [first] = this.getPorts();
    return first.port;
  }

  getPorts(): BoundPort[] {
    return this.listeners.map((listener) => ({
      port: listener.boundPort ?? listener.binding.port,
      protocol: listener.binding.protocol,
    }));
  }

  async start(): Promise<void> {
    const results = await Promise.allSettled(
      this.listeners.map((listener) =>
        listener.binding.protocol === 'udp' ? this.startUDP(listener) : this.startTCP(listener),
      ),
    );
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      await this.stop();
      throw toError(failure.reason);
    }
  }

  async stop(): Promise<void> {
    await Promise.all(this.listeners.map((listener) => this.stopListener(listener)));
  }

  /**
   * Resolves one wire-format query. Resolves with null when the message is
   * not a decodable query, which the listeners drop.
   */
  async handleQuery(message: Buffer, protocol: Protocol): Promise<Buffer | null> {
    let packet: dnsPacket.DecodedPacket;
    try {
      packet = dnsPacket.decode(message);
    } catch (error) {
      logger.warn('Dropping undecodable DNS message', { protocol, error: toError(error).message });
      return null;
    }
    if (packet.type === 'response') {
      return null;
    }

    const id = packet.id ?? 0;
    const recursionDesired = ((packet.flags ?? 0) & dnsPacket.RECURSION_DESIRED) !== 0;
    const question = packet.questions?.[0];
    if (!question) {
      recordDNSQuery({ type: 'NONE', result: 'formerr', protocol });
      return this.encodeResponse(packet, RCODE.FORMERR, recursionDesired);
    }

    const request: DNSRequest = {
      id,
      question: { name: question.name, type: question.type, class: question.class ?? 'IN' },
      recursionDesired,
      protocol,
      raw: message,
    };

    try {
      const resolution = await this.resolver.resolve(request);
      const response = this.buildResponse(packet, request, resolution);
      recordDNSQuery({ type: request.question.type, result: resultOf(resolution), protocol });
      return response;
    } catch (error) {
      if (error instanceof UpstreamError) {
        logger.warn('Upstream DNS failed', {
          domain: request.question.name,
          type: request.question.type,
          upstream: error.upstream,
          error: error.message,
        });
      } else {
        logger.error('Error resolving DNS query', {
          domain: request.question.name,
          type: request.question.type,
          error: toError(error),
        });
      }
      recordDNSQuery({ type: request.question.type, result: 'servfail', protocol });
      return this.encodeResponse(packet, RCODE.SERVFAIL, recursionDesired);
    }
  }

  private buildResponse(packet: dnsPacket.DecodedPacket, request: DNSRequest, resolution: Resolution): Buffer {
    const { question } = request;
    switch (resolution.kind) {
      case 'answer':
        logger.debug('Found local records', {
          domain: question.name,
          type: question.type,
          count: resolution.records.length,
        });
        return this.encodeResponse(packet, RCODE.NOERROR, request.recursionDesired, {
          authoritative: true,
          answers: resolution.records.map((record) => record.toAnswer()),
        });
      case 'authority':
        logger.debug('Found higher level SOA record', {
          domain: question.name,
          type: question.type,
          zone: resolution.soa.name,
        });
        return this.encodeResponse(
          packet,
          resolution.nameExists ? RCODE.NOERROR : RCODE.NXDOMAIN,
          request.recursionDesired,
          { authoritative: true, authorities: [resolution.soa.toAnswer()] },
        );
      case 'forwarded':
        logger.debug('Proxied query', { domain: question.name, type: question.type, upstream: resolution.upstream });
        return resolution.response;
      case 'not-found':
        logger.debug('No local record and no upstream', { domain: question.name, type: question.type });
        return this.encodeResponse(packet, RCODE.NXDOMAIN, request.recursionDesired);
    }
  }

  private encodeResponse(
    packet: dnsPacket.DecodedPacket,
    rcode: number,
    recursionDesired: boolean,
    sections: { authoritative?: boolean; answers?: ResourceAnswer[]; authorities?: ResourceAnswer[] } = {},
  ): Buffer {
    let flags = dnsPacket.RECURSION_AVAILABLE | rcode;
    if (recursionDesired) flags |= dnsPacket.RECURSION_DESIRED;
    if (sections.authoritative) flags |= dnsPacket.AUTHORITATIVE_ANSWER;

    return dnsPacket.encode({
      type: 'response',
      id: packet.id ?? 0,
      flags,
      questions: packet.questions ?? [],
      answers: sections.answers ?? [],
      authorities: sections.authorities ?? [],
    });
  }

  private async reply(message: Buffer, protocol: Protocol, clientIp: string): Promise<Buffer | null> {
    try {
      return await this.handleQuery(message, protocol);
    } catch (error) {
      // only encoding can fail here
      logger.error('Failed to build DNS response', { error: toError(error), clientIp, protocol });
      return null;
    }
  }

  private startUDP(listener: Listener): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const socket = dgram.createSocket(net.isIPv6(this.bindAddress) ? 'udp6' : 'udp4');
      let started = false;

      socket.on('message', (msg, rinfo) => {
        void this.reply(msg, 'udp', rinfo.address).then((response) => {
          // the listener may have been stopped while the query was resolving
          if (!response || listener.udp !== socket) return;
          try {
            socket.send(response, rinfo.port, rinfo.address, (err) => {
              if (err) {
                logger.error('Error sending UDP response', { error: err, clientIp: rinfo.address });
              }
            });
          } catch (error) {
            logger.warn('Dropping UDP response', { clientIp: rinfo.address, error: toError(error).message });
          }
        });
      });

      socket.on('error', (err) => {
        if (started) {
          logger.warn('UDP server error after startup - attempting to continue', { error: err.message });
        } else {
          reject(err);
        }
      });

      socket.bind(listener.binding.port, this.bindAddress, () => {
        started = true;
        listener.udp = socket;
        listener.boundPort = socket.address().port;
        logger.info('DNS server (UDP) running', { port: listener.boundPort, address: this.bindAddress });
        resolve();
      });
    });
  }

  private startTCP(listener: Listener): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const server = net.createServer((socket) => this.setupTCPSocket(socket, listener));
      let started = false;

      server.on('error', (err) => {
        if (started) {
          logger.warn('TCP server error after startup - attempting to continue', { error: err.message });
        } else {
          reject(err);
        }
      });

      server.listen(listener.binding.port, this.bindAddress, () => {
        started = true;
        listener.tcp = server;
        const address = server.address();
        listener.boundPort = typeof address === 'object' && address ? address.port : listener.binding.port;
        logger.info('DNS server (TCP) running', { port: listener.boundPort, address: this.bindAddress });
        resolve();
      });
    });
  }

  private setupTCPSocket(socket: net.Socket, listener: Listener): void {
    const clientIp = socket.remoteAddress || 'unknown';
    let buffer: Buffer = Buffer.alloc(0);
    listener.sockets.add(socket);

    socket.on('data', (data: Buffer) => {
      buffer = Buffer.concat([buffer, data]);

      // TCP DNS messages have a 2-byte length prefix
      while (buffer.length >= 2) {
        const expectedLength = buffer.readUInt16BE(0);
        if (buffer.length < expectedLength + 2) {
          break;
        }
        const message = buffer.subarray(2, expectedLength + 2);
        buffer = buffer.subarray(expectedLength + 2);

        void this.reply(message, 'tcp', clientIp).then((response) => {
          if (!response || socket.destroyed) return;
          const lengthPrefix = Buffer.allocUnsafe(2);
          lengthPrefix.writeUInt16BE(response.length, 0);
          socket.write(Buffer.concat([lengthPrefix, response]));
        });
      }
    });

    socket.on('error', (err) => {
      logger.warn('TCP connection error', { clientIp, error: err.message });
    });

    socket.on('close', () => {
      listener.sockets.delete(socket);
    });
  }

  private async stopListener(listener: Listener): Promise<void> {
    const { udp, tcp } = listener;
    listener.udp = null;
    listener.tcp = null;
    listener.boundPort = null;

    if (udp) {
      await new Promise<void>((resolve) => udp.close(() => resolve()));
      logger.info('DNS server (UDP) stopped', { port: listener.binding.port });
    }
    if (tcp) {
      for (const socket of listener.sockets) {
        socket.destroy();
      }
      listener.sockets.clear();
      await new Promise<void>((resolve, reject) => tcp.close((err) => (err ? reject(err) : resolve())));
      logger.info('DNS server (TCP) stopped', { port: listener.binding.port });
    }
  }
}

export interface DNSServerOptions extends ListenOptions {
  /** Initial zones; mutually exclusive with `store`. */
  zones?: readonly Zone[];
  /** An existing record store to serve from, shared with the caller. */
  store?: RecordStore;
  /** Comma-separated upstream addresses; null or empty serves local records only. */
  upstream?: string | null;
  failover?: boolean;
  upstreamTimeoutMs?: number;
  transport?: UpstreamTransport;
  /** Serial for SOA answers given as `[mname, rname]`; defaults to now. */
  serial?: number;
}

/**
 * Serves a mutable set of local records and forwards everything else to the
 * upstream servers in rotation.
 */
export class DNSServer extends BaseDNSServer {
  readonly records: RecordStore;
  readonly serial: number;

  constructor(options: DNSServerOptions = {}) {
    if (options.zones && options.store) {
      throw new ConfigurationError('Pass either zones or a record store, not both');
    }
    const serial = options.serial ?? defaultSerial();
    const store: RecordStore =
      options.store ??
      new SharedStore<readonly ZoneRecord[]>((options.zones ?? []).map((zone) => ZoneRecord.fromZone(zone, { serial })));

    super({ kind: 'resolver', resolver: DNSServer.compose(store, options) }, options);
    this.records = store;
    this.serial = serial;
  }

  private static compose(store: RecordStore, options: DNSServerOptions): Resolver {
    const local = new RecordsResolver(store);
    const upstream = options.upstream === undefined ? DEFAULT_UPSTREAM : options.upstream;
    if (!upstream) {
      logger.info('Without upstream DNS server');
      return local;
    }
    logger.info('Upstream DNS server', { upstream });
    const proxies = createProxyResolvers(upstream, {
      timeoutMs: options.upstreamTimeoutMs,
      transport: options.transport,
    });
    return new RoundRobinResolver([local, ...proxies], { failover: options.failover });
  }

  static async fromZonesFile(path: string, options: Omit<DNSServerOptions, 'zones' | 'store'> = {}): Promise<DNSServer> {
    const zones = await loadZonesFile(path);
    logger.info('Loaded zone records', {
      count: zones.length,
      file: path,
      upstream: options.upstream === undefined ? DEFAULT_UPSTREAM : options.upstream,
    });
    return new DNSServer({ ...options, zones });
  }

  async addRecord(zone: Zone): Promise<ZoneRecord> {
    const record = ZoneRecord.fromZone(zone, { serial: this.serial });
    await this.records.update((records) => [...records, record]);
    logger.info('Added record', { name: record.name, type: record.type });
    return record;
  }

  /** Adds an already built resource record, keeping its own TTL. */
  async addResourceRecord(answer: ResourceAnswer): Promise<ZoneRecord> {
    const record = ZoneRecord.fromAnswer(answer);
    await this.records.update((records) => [...records, record]);
    return record;
  }

  /**
   * Replaces every record. All zones are converted first, so one bad zone
   * leaves the current records in place.
   */
  async setRecords(zones: readonly Zone[]): Promise<void> {
    const records = zones.map((zone) => ZoneRecord.fromZone(zone, { serial: this.serial }));
    await this.records.replace(records);
    logger.info('Replaced records', { count: records.length });
  }

  getRecords(): Promise<readonly ZoneRecord[]> {
    return this.records.snapshot();
  }
}
