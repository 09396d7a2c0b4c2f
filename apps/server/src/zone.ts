import { ValidationError } from './errors.js';

export const RECORD_TYPES = [
  'A',
  'AAAA',
  'CAA',
  'CNAME',
  'DNSKEY',
  'MX',
  'NAPTR',
  'NS',
  'PTR',
  'RRSIG',
  'SOA',
  'SRV',
  'TXT',
  'SPF',
] as const;

export type RecordType = (typeof RECORD_TYPES)[number];

export type AnswerValue = string | number;

export type ZoneAnswer = string | readonly AnswerValue[];

export interface ZoneInit {
  host: string;
  type: RecordType;
  answer: ZoneAnswer;
}

export function isRecordType(value: unknown): value is RecordType {
  return RECORD_TYPES.some((type) => type === value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isAnswerValue(value: unknown): value is AnswerValue {
  return typeof value === 'string' || (typeof value === 'number' && Number.isInteger(value));
}

function describe(data: unknown): string {
  try {
    return JSON.stringify(data) ?? String(data);
  } catch {
    return String(data);
  }
}

/**
 * Multi-line answers (TOML triple-quoted strings, mostly) are joined back
 * into one line: each line break is removed together with the whitespace
 * around it.
 */
export function normalizeAnswer(answer: string): string {
  return answer.replace(/\s*\r?\n\s*/g, '').trim();
}

/**
 * One DNS answer as it was declared, before it is turned into a resource
 * record.
 */
export class Zone {
  readonly host: string;
  readonly type: RecordType;
  readonly answer: ZoneAnswer;

  constructor(init: ZoneInit) {
    this.host = init.host;
    this.type = init.type;
    this.answer = typeof init.answer === 'string' ? init.answer : Object.freeze([...init.answer]);
    Object.freeze(this);
  }

  /**
   * Validates one entry of a zones list. `index` is only used in error
   * messages.
   */
  static fromRaw(index: number, data: unknown): Zone {
    const keys = isPlainObject(data) ? Object.keys(data) : [];
    if (
      !isPlainObject(data) ||
      keys.length !== 3 ||
      !keys.includes('host') ||
      !keys.includes('type') ||
      !keys.includes('answer')
    ) {
      throw new ValidationError(
        `Zone ${index} is not a valid object, must have keys "host", "type" and "answer", got ${describe(data)}`,
        index,
      );
    }

    const { host, type, answer } = data;
    if (typeof host !== 'string') {
      throw new ValidationError(`Zone ${index} is invalid, "host" must be string, got ${describe(data)}`, index);
    }

    if (!isRecordType(type)) {
      throw new ValidationError(
        `Zone ${index} is invalid, "type" must be one of ${RECORD_TYPES.join(', ')}, got ${describe(data)}`,
        index,
      );
    }

    if (typeof answer === 'string') {
      return new Zone({ host, type, answer: normalizeAnswer(answer) });
    }

    if (!Array.isArray(answer) || !answer.every(isAnswerValue)) {
      throw new ValidationError(
        `Zone ${index} is invalid, "answer" must be a string or list of strings and ints, got ${describe(data)}`,
        index,
      );
    }

    return new Zone({ host, type, answer });
  }

  /** Validates a whole list; the first bad entry rejects the list. */
  static fromRawList(data: unknown): Zone[] {
    if (!Array.isArray(data)) {
      throw new ValidationError(`Zones must be a list, got ${describe(data)}`);
    }
    return data.map((entry: unknown, index) => Zone.fromRaw(index, entry));
  }

  toJSON(): { host: string; type: RecordType; answer: ZoneAnswer } {
    return { host: this.host, type: this.type, answer: this.answer };
  }
}
