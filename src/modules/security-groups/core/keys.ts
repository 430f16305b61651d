/**
 * Key schema for cached provider resources.
 *
 * Format: `{prefix}:{type}:{account}:{region}:{name}:{id}:{vpcId}`
 *
 * Resources outside a VPC have an empty trailing segment. Inside a segment,
 * `%`, `:` and the glob characters `* ? [ ] \` are percent-encoded, so a key
 * never holds an unescaped delimiter and a pattern never needs glob escaping.
 */

import { err, ok, type Result } from 'neverthrow';

import type { InvalidKeyError } from './errors.js';
import type { KeyCriteria, ResourceKey } from './types.js';

const SEPARATOR = ':';
const WILDCARD = '*';
const SEGMENT_COUNT = 7;

const RESERVED = /[%:*?[\]\\]/g;
const ENCODED = /%([0-9A-F]{2})/g;

const encodeSegment = (value: string): string =>
  value.replace(RESERVED, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);

const decodeSegment = (value: string): string =>
  value.replace(ENCODED, (_match, hex: string) => String.fromCharCode(Number.parseInt(hex, 16)));

export interface KeySchema {
  /**
   * Encode a resource identity into its cache key.
   */
  encode(
    type: string,
    account: string,
    region: string,
    name: string,
    id: string,
    vpcId?: string
  ): string;

  /**
   * Decode a cache key. Exact inverse of `encode`.
   */
  parse(key: string): Result<ResourceKey, InvalidKeyError>;

  /**
   * Build a glob pattern selecting keys of `type` that agree with `criteria`.
   */
  buildPattern(type: string, criteria: KeyCriteria): string;

  /**
   * Leading segment shared by every key.
   */
  getPrefix(): string;
}

export interface KeySchemaOptions {
  /** First key segment, naming the provider. Defaults to 'aws'. */
  prefix?: string;
}

/**
 * Create a key schema instance.
 */
export const createKeySchema = (options: KeySchemaOptions = {}): KeySchema => {
  const prefix = options.prefix ?? 'aws';
  const encodedPrefix = encodeSegment(prefix);

  return {
    encode(type, account, region, name, id, vpcId) {
      return [prefix, type, account, region, name, id, vpcId ?? '']
        .map(encodeSegment)
        .join(SEPARATOR);
    },

    parse(key): Result<ResourceKey, InvalidKeyError> {
      const segments = key.split(SEPARATOR);
      if (segments.length !== SEGMENT_COUNT) {
        return err({
          type: 'InvalidKey',
          message: `Expected ${String(SEGMENT_COUNT)} key segments, found ${String(segments.length)}`,
          key,
        });
      }

      const [keyPrefix, type, account, region, name, id, vpcId] = segments.map(decodeSegment);
      if (keyPrefix !== prefix) {
        return err({
          type: 'InvalidKey',
          message: `Key does not start with '${prefix}${SEPARATOR}'`,
          key,
        });
      }

      if (
        type === undefined ||
        account === undefined ||
        region === undefined ||
        name === undefined ||
        id === undefined
      ) {
        return err({ type: 'InvalidKey', message: 'Key is missing segments', key });
      }

      return ok({
        type,
        account,
        region,
        name,
        id,
        ...(vpcId !== undefined && vpcId !== '' && { vpcId }),
      });
    },

    buildPattern(type, criteria) {
      const field = (value: string | undefined): string =>
        value === undefined ? WILDCARD : encodeSegment(value);

      const vpcSegment =
        criteria.vpcId === undefined
          ? WILDCARD
          : criteria.vpcId === null
            ? ''
            : encodeSegment(criteria.vpcId);

      return [
        encodedPrefix,
        encodeSegment(type),
        field(criteria.account),
        field(criteria.region),
        field(criteria.name),
        field(criteria.id),
        vpcSegment,
      ].join(SEPARATOR);
    },

    getPrefix() {
      return prefix;
    },
  };
};

/**
 * Check a decoded key against criteria. Used to narrow pattern scan results.
 */
export const matchesCriteria = (key: ResourceKey, criteria: KeyCriteria): boolean => {
  if (criteria.account !== undefined && key.account !== criteria.account) return false;
  if (criteria.region !== undefined && key.region !== criteria.region) return false;
  if (criteria.name !== undefined && key.name !== criteria.name) return false;
  if (criteria.id !== undefined && key.id !== criteria.id) return false;
  if (criteria.vpcId === null && key.vpcId !== undefined) return false;
  if (typeof criteria.vpcId === 'string' && key.vpcId !== criteria.vpcId) return false;
  return true;
};

/**
 * Whether criteria constrain any field at all.
 */
export const hasCriteria = (criteria: KeyCriteria): boolean =>
  criteria.account !== undefined ||
  criteria.region !== undefined ||
  criteria.name !== undefined ||
  criteria.id !== undefined ||
  criteria.vpcId !== undefined;
