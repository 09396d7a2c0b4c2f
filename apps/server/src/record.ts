import { isIPv4, isIPv6 } from 'net';
import type { Answer, CaaData } from 'dns-packet';
import { ValidationError } from './errors.js';
import type { AnswerValue, Zone } from './zone.js';

/** Every answer kind that carries record data (everything but EDNS OPT). */
export type ResourceAnswer = Extract<Answer, { data: unknown }>;

export interface RecordQuestion {
  name: string;
  type: string;
}

export interface RecordOptions {
  /** SOA serial used when a two-value SOA answer is completed. */
  serial: number;
}

export const TXT_CHUNK_BYTES = 255;

export const SOA_DEFAULTS = {
  refresh: 3600,
  retry: 3600 * 3,
  expire: 3600 * 24,
  minimum: 3600,
} as const;

const U8 = 0xff;
const U16 = 0xffff;
const U32 = 0xffffffff;

const CAA_TAGS: readonly CaaData['tag'][] = ['issue', 'issuewild', 'iodef'];

/** Seconds since the Unix epoch, the serial given to completed SOA answers. */
export function defaultSerial(now: number = Date.now()): number {
  return Math.floor(now / 1000);
}

export function ttlFor(type: string): number {
  return type === 'NS' || type === 'SOA' ? 3600 * 24 : 300;
}

export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/\.$/, '');
}

/**
 * Splits text into character-strings of at most `limit` UTF-8 bytes without
 * cutting a character in half.
 */
export function chunkText(text: string, limit: number = TXT_CHUNK_BYTES): string[] {
  const chunks: string[] = [];
  let current = '';
  let currentBytes = 0;
  for (const char of text) {
    const bytes = Buffer.byteLength(char);
    if (currentBytes + bytes > limit) {
      chunks.push(current);
      current = '';
      currentBytes = 0;
    }
    current += char;
    currentBytes += bytes;
  }
  chunks.push(current);
  return chunks;
}

function isCaaTag(value: string): value is CaaData['tag'] {
  return CAA_TAGS.some((tag) => tag === value);
}

class AnswerReader {
  readonly values: readonly AnswerValue[];

  constructor(private readonly zone: Zone) {
    this.values = typeof zone.answer === 'string' ? [zone.answer] : zone.answer;
  }

  fail(reason: string): ValidationError {
    return new ValidationError(
      `Zone "${this.zone.host}" of type ${this.zone.type} has an invalid answer: ${reason}, got ${JSON.stringify(
        this.zone.answer,
      )}`,
    );
  }

  expectCount(...counts: number[]): void {
    if (!counts.includes(this.values.length)) {
      throw this.fail(`expected ${counts.join(' or ')} value(s)`);
    }
  }

  string(position: number, field: string): string {
    const value = this.values[position];
    if (value === undefined) {
      throw this.fail(`missing ${field}`);
    }
    return String(value);
  }

  /** Reads an unsigned integer that fits a wire field holding at most `max`. */
  integer(position: number, field: string, max: number): number {
    const value = this.values[position];
    const parsed = typeof value === 'string' && /^-?\d+$/.test(value.trim()) ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
      throw this.fail(`${field} must be an integer`);
    }
    if (parsed < 0 || parsed > max) {
      throw this.fail(`${field} must be between 0 and ${max}`);
    }
    return parsed;
  }

  optionalInteger(position: number, field: string, max: number): number | undefined {
    return this.values[position] === undefined ? undefined : this.integer(position, field, max);
  }

  base64(position: number, field: string): Buffer {
    const value = this.string(position, field).replace(/\s+/g, '');
    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(value)) {
      throw this.fail(`${field} must be base64`);
    }
    return Buffer.from(value, 'base64');
  }
}

function buildAnswer(zone: Zone, options: RecordOptions): ResourceAnswer {
  const reader = new AnswerReader(zone);
  const name = zone.host.replace(/\.$/, '');
  const ttl = ttlFor(zone.type === 'SPF' ? 'TXT' : zone.type);
  const base = { name, ttl, class: 'IN' as const };

  switch (zone.type) {
    case 'A':
    case 'AAAA': {
      reader.expectCount(1);
      const address = reader.string(0, 'address');
      const valid = zone.type === 'A' ? isIPv4(address) : isIPv6(address);
      if (!valid) {
        throw reader.fail(`"${address}" is not an ${zone.type === 'A' ? 'IPv4' : 'IPv6'} address`);
      }
      return { ...base, type: zone.type, data: address };
    }
    case 'CNAME':
    case 'NS':
    case 'PTR':
      reader.expectCount(1);
      return { ...base, type: zone.type, data: reader.string(0, 'target') };
    case 'MX':
      reader.expectCount(1, 2);
      return {
        ...base,
        type: 'MX',
        data: {
          exchange: reader.string(0, 'exchange'),
          preference: reader.optionalInteger(1, 'preference', U16) ?? 10,
        },
      };
    case 'TXT':
    case 'SPF': {
      // SPF is served as a TXT record
      const strings =
        typeof zone.answer === 'string'
          ? chunkText(zone.answer)
          : zone.answer.flatMap((value) => chunkText(String(value)));
      return { ...base, type: 'TXT', data: strings };
    }
    case 'SOA': {
      const mname = reader.string(0, 'mname');
      const rname = reader.string(1, 'rname');
      if (reader.values.length === 2) {
        return { ...base, type: 'SOA', data: { mname, rname, serial: options.serial, ...SOA_DEFAULTS } };
      }
      if (reader.values.length > 7) {
        throw reader.fail('expected at most 7 values');
      }
      return {
        ...base,
        type: 'SOA',
        data: {
          mname,
          rname,
          serial: reader.optionalInteger(2, 'serial', U32),
          refresh: reader.optionalInteger(3, 'refresh', U32),
          retry: reader.optionalInteger(4, 'retry', U32),
          expire: reader.optionalInteger(5, 'expire', U32),
          minimum: reader.optionalInteger(6, 'minimum', U32),
        },
      };
    }
    case 'SRV':
      reader.expectCount(4);
      return {
        ...base,
        type: 'SRV',
        data: {
          priority: reader.integer(0, 'priority', U16),
          weight: reader.integer(1, 'weight', U16),
          port: reader.integer(2, 'port', U16),
          target: reader.string(3, 'target'),
        },
      };
    case 'CAA': {
      reader.expectCount(3);
      const tag = reader.string(1, 'tag');
      if (!isCaaTag(tag)) {
        throw reader.fail(`tag must be one of ${CAA_TAGS.join(', ')}`);
      }
      return {
        ...base,
        type: 'CAA',
        data: { flags: reader.integer(0, 'flags', U8), tag, value: reader.string(2, 'value') },
      };
    }
    case 'NAPTR':
      reader.expectCount(6);
      return {
        ...base,
        type: 'NAPTR',
        data: {
          order: reader.integer(0, 'order', U16),
          preference: reader.integer(1, 'preference', U16),
          flags: reader.string(2, 'flags'),
          services: reader.string(3, 'services'),
          regexp: reader.string(4, 'regexp'),
          replacement: reader.string(5, 'replacement'),
        },
      };
    case 'DNSKEY': {
      reader.expectCount(4);
      if (reader.integer(1, 'protocol', U8) !== 3) {
        throw reader.fail('protocol must be 3');
      }
      return {
        ...base,
        type: 'DNSKEY',
        data: {
          flags: reader.integer(0, 'flags', U16),
          algorithm: reader.integer(2, 'algorithm', U8),
          key: reader.base64(3, 'key'),
        },
      };
    }
    case 'RRSIG':
      reader.expectCount(9);
      return {
        ...base,
        type: 'RRSIG',
        data: {
          typeCovered: reader.string(0, 'typeCovered'),
          algorithm: reader.integer(1, 'algorithm', U8),
          labels: reader.integer(2, 'labels', U8),
          originalTTL: reader.integer(3, 'originalTTL', U32),
          expiration: reader.integer(4, 'expiration', U32),
          inception: reader.integer(5, 'inception', U32),
          keyTag: reader.integer(6, 'keyTag', U16),
          signersName: reader.string(7, 'signersName'),
          signature: reader.base64(8, 'signature'),
        },
      };
  }
}

function jsonValue(value: unknown): unknown {
  if (Buffer.isBuffer(value)) {
    return value.toString('base64');
  }
  if (Array.isArray(value)) {
    return value.map(jsonValue);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, field]) => [key, jsonValue(field)]));
  }
  return value;
}

/**
 * A resource record held by the record store, with the predicates the
 * resolvers match queries against.
 */
export class ZoneRecord {
  readonly name: string;
  readonly type: string;
  readonly ttl: number;
  private readonly answer: ResourceAnswer;
  private readonly normalizedName: string;
  private readonly labels: readonly string[];

  private constructor(answer: ResourceAnswer) {
    this.answer = Object.freeze(answer);
    this.name = answer.name;
    this.type = answer.type;
    this.ttl = answer.ttl ?? ttlFor(answer.type);
    this.normalizedName = normalizeName(answer.name);
    this.labels = this.normalizedName === '' ? [] : this.normalizedName.split('.');
  }

  static fromZone(zone: Zone, options: RecordOptions): ZoneRecord {
    return new ZoneRecord(buildAnswer(zone, options));
  }

  /** Wraps an answer built elsewhere; it keeps its own TTL when it has one. */
  static fromAnswer(answer: ResourceAnswer): ZoneRecord {
    return new ZoneRecord({ ...answer, ttl: answer.ttl ?? ttlFor(answer.type) });
  }

  hasName(name: string): boolean {
    return normalizeName(name) === this.normalizedName;
  }

  match(question: RecordQuestion): boolean {
    return this.hasName(question.name) && (question.type === 'ANY' || question.type === this.type);
  }

  /** True for an SOA record when the question is for its zone or below it. */
  subMatch(question: RecordQuestion): boolean {
    if (this.type !== 'SOA') {
      return false;
    }
    const queried = normalizeName(question.name);
    const labels = queried === '' ? [] : queried.split('.');
    if (labels.length < this.labels.length) {
      return false;
    }
    const offset = labels.length - this.labels.length;
    return this.labels.every((label, index) => labels[offset + index] === label);
  }

  /** Number of labels in the owner name, used to pick the closest SOA. */
  get depth(): number {
    return this.labels.length;
  }

  toAnswer(): ResourceAnswer {
    return this.answer;
  }

  toJSON(): { name: string; type: string; ttl: number; data: unknown } {
    return { name: this.name, type: this.type, ttl: this.ttl, data: jsonValue(this.answer.data) };
  }
}
