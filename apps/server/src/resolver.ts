import * as dnsPacket from 'dns-packet';
import { ConfigurationError, UpstreamError } from './errors.js';
import { logger, toError } from './logger.js';
import { recordUpstreamMetrics } from './otel-metrics.js';
import type { ZoneRecord } from './record.js';
import type { SharedStore } from './shared-store.js';
import {
  DEFAULT_UPSTREAM_TIMEOUT_MS,
  formatEndpoint,
  parseUpstream,
  parseUpstreamList,
  socketTransport,
  type Protocol,
  type UpstreamEndpoint,
  type UpstreamTransport,
} from './upstream.js';

export type RecordStore = SharedStore<readonly ZoneRecord[]>;

export interface DNSQuestion {
  name: string;
  type: string;
  class: string;
}

/** A decoded query together with the bytes it arrived as. */
export interface DNSRequest {
  id: number;
  question: DNSQuestion;
  recursionDesired: boolean;
  protocol: Protocol;
  raw: Buffer;
}

export type Resolution =
  | { kind: 'answer'; records: readonly ZoneRecord[] }
  /** No such record, but the name falls inside a zone held locally. */
  | { kind: 'authority'; soa: ZoneRecord; nameExists: boolean }
  | { kind: 'forwarded'; upstream: string; response: Buffer }
  | { kind: 'not-found' };

export interface Resolver {
  /** Forwarding resolvers are only consulted after every local one declined. */
  readonly forwarding: boolean;
  resolve(request: DNSRequest): Promise<Resolution>;
}

export class RecordsResolver implements Resolver {
  readonly forwarding = false;

  constructor(readonly store: RecordStore) {}

  async resolve(request: DNSRequest): Promise<Resolution> {
    // Records are never mutated in place, so matching runs on the snapshot
    // after the lock is released.
    const records = await this.store.snapshot();
    const { question } = request;

    const matches = records.filter((record) => record.match(question));
    if (matches.length > 0) {
      return { kind: 'answer', records: matches };
    }

    let soa: ZoneRecord | undefined;
    for (const record of records) {
      if (record.subMatch(question) && (!soa || record.depth > soa.depth)) {
        soa = record;
      }
    }
    if (soa) {
      return { kind: 'authority', soa, nameExists: records.some((record) => record.hasName(question.name)) };
    }

    return { kind: 'not-found' };
  }
}

export interface ProxyResolverOptions {
  timeoutMs?: number;
  transport?: UpstreamTransport;
}

export class ProxyResolver implements Resolver {
  readonly forwarding = true;
  readonly endpoint: UpstreamEndpoint;
  readonly address: string;
  private readonly timeoutMs: number;
  private readonly transport: UpstreamTransport;

  constructor(upstream: string | UpstreamEndpoint, options: ProxyResolverOptions = {}) {
    this.endpoint = typeof upstream === 'string' ? parseUpstream(upstream) : upstream;
    this.address = formatEndpoint(this.endpoint);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS;
    this.transport = options.transport ?? socketTransport;
  }

  async resolve(request: DNSRequest): Promise<Resolution> {
    const startTime = Date.now();
    try {
      // a truncated UDP reply is relayed as is so the client retries over TCP
      const response = await this.exchange(request, request.protocol);
      const decoded = this.decode(response);
      if (decoded.id !== request.id) {
        throw new UpstreamError(`Reply from ${this.address} does not match query ${request.id}`, this.address);
      }

      recordUpstreamMetrics({
        upstream: this.address,
        success: true,
        responseTime: Date.now() - startTime,
        queryType: request.question.type,
      });
      logger.debug('Forwarded query', { domain: request.question.name, upstream: this.address });
      return { kind: 'forwarded', upstream: this.address, response };
    } catch (error) {
      recordUpstreamMetrics({ upstream: this.address, success: false, queryType: request.question.type });
      throw error;
    }
  }

  private async exchange(request: DNSRequest, protocol: Protocol): Promise<Buffer> {
    try {
      return await this.transport.exchange(request.raw, this.endpoint, protocol, this.timeoutMs);
    } catch (error) {
      throw new UpstreamError(`Upstream ${this.address} failed: ${toError(error).message}`, this.address, {
        cause: error,
      });
    }
  }

  private decode(response: Buffer): dnsPacket.DecodedPacket {
    try {
      return dnsPacket.decode(response);
    } catch (error) {
      throw new UpstreamError(`Malformed reply from ${this.address}`, this.address, { cause: error });
    }
  }
}

export interface RoundRobinOptions {
  /**
   * Try the next upstream within the same query when one fails. Off by
   * default: the first failure is surfaced.
   */
  failover?: boolean;
}

/**
 * Local resolvers are asked first, in order. When all of them decline the
 * query goes to one upstream, picked by a cursor that moves on by one after
 * every dispatch.
 */
export class RoundRobinResolver implements Resolver {
  readonly forwarding: boolean;
  readonly resolvers: readonly Resolver[];
  private readonly local: readonly Resolver[];
  private readonly upstreams: readonly Resolver[];
  private readonly failover: boolean;
  private cursor = 0;

  constructor(resolvers: readonly Resolver[], options: RoundRobinOptions = {}) {
    if (resolvers.length === 0) {
      throw new ConfigurationError('RoundRobinResolver needs at least one resolver');
    }
    this.resolvers = resolvers;
    this.local = resolvers.filter((resolver) => !resolver.forwarding);
    this.upstreams = resolvers.filter((resolver) => resolver.forwarding);
    this.forwarding = this.local.length === 0;
    this.failover = options.failover ?? false;
  }

  async resolve(request: DNSRequest): Promise<Resolution> {
    for (const resolver of this.local) {
      const resolution = await resolver.resolve(request);
      if (resolution.kind !== 'not-found') {
        return resolution;
      }
    }

    if (this.upstreams.length === 0) {
      return { kind: 'not-found' };
    }

    const attempts = this.failover ? this.upstreams.length : 1;
    for (let attempt = 1; ; attempt++) {
      const upstream = this.next();
      try {
        return await upstream.resolve(request);
      } catch (error) {
        if (!(error instanceof UpstreamError) || attempt >= attempts) {
          throw error;
        }
        logger.warn('Upstream failed, trying next', {
          domain: request.question.name,
          upstream: error.upstream,
          error: error.message,
        });
      }
    }
  }

  private next(): Resolver {
    const index = this.cursor % this.upstreams.length;
    this.cursor = (index + 1) % this.upstreams.length;
    return this.upstreams[index];
  }
}

export type ResolverSpec =
  | { kind: 'records'; store: RecordStore }
  | { kind: 'proxy'; upstreams: string; options?: ProxyResolverOptions & RoundRobinOptions }
  | { kind: 'resolver'; resolver: Resolver };

export function createResolver(spec: ResolverSpec): Resolver {
  switch (spec.kind) {
    case 'records':
      return new RecordsResolver(spec.store);
    case 'proxy': {
      const proxies = createProxyResolvers(spec.upstreams, spec.options);
      return proxies.length === 1 ? proxies[0] : new RoundRobinResolver(proxies, spec.options);
    }
    case 'resolver':
      return spec.resolver;
    default: {
      const unknown: never = spec;
      throw new ConfigurationError(`Unrecognized resolver spec ${JSON.stringify(unknown)}`);
    }
  }
}

export function createProxyResolvers(upstreams: string, options: ProxyResolverOptions = {}): ProxyResolver[] {
  const endpoints = parseUpstreamList(upstreams);
  if (endpoints.length === 0) {
    throw new ConfigurationError(`No upstream address in "${upstreams}"`);
  }
  return endpoints.map((endpoint) => new ProxyResolver(endpoint, options));
}
