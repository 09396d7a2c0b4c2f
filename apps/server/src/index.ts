export { createAdminApp, type AdminApiOptions } from './admin-api.js';
export { loadConfig, type ServerConfig } from './config.js';
export {
  BaseDNSServer,
  DNSServer,
  DEFAULT_UPSTREAM,
  parsePortSpec,
  type BoundPort,
  type DNSServerOptions,
  type ListenOptions,
  type PortBinding,
  type PortSpec,
} from './dns-server.js';
export { ConfigurationError, DNSServerError, UpstreamError, ValidationError } from './errors.js';
export { Logger, logger, type LogLevel } from './logger.js';
export { ZoneRecord, chunkText, defaultSerial, ttlFor, type RecordQuestion, type ResourceAnswer } from './record.js';
export {
  ProxyResolver,
  RecordsResolver,
  RoundRobinResolver,
  createResolver,
  type DNSQuestion,
  type DNSRequest,
  type RecordStore,
  type Resolution,
  type Resolver,
  type ResolverSpec,
} from './resolver.js';
export { SharedStore } from './shared-store.js';
export { DEFAULT_PORT, parseUpstream, type Protocol, type UpstreamEndpoint, type UpstreamTransport } from './upstream.js';
export { RECORD_TYPES, Zone, type RecordType, type ZoneAnswer } from './zone.js';
export { loadZonesFile, parseZones } from './zones-file.js';
