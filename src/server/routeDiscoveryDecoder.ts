/**
 * Route Discovery Decoder
 *
 * Turns a TRACEROUTE_APP payload into a RouteDiscoveryRecord. Strategies are
 * tried in order and the first one that produces a record wins:
 *
 *   1. protobuf - the RouteDiscovery message from the loaded definitions
 *   2. json     - `{ route_nodes, snr_towards, route_back, snr_back }` fixtures
 *   3. wire     - a tolerant walk over the raw protobuf wire format that keeps
 *                 whatever it decoded before hitting bad bytes
 *
 * Wire-level SNR values are dB x 4; the JSON form already carries dB.
 */
import { decodeRouteDiscoveryMessage, getProtobufRoot } from './protobufLoader.js';
import type { RouteDiscoveryRecord } from '../types/traceroute.js';
import { logger } from '../utils/logger.js';

export type DecodeStrategyName = 'protobuf' | 'json' | 'wire';

export interface RouteDiscoveryDecodeResult {
  record: RouteDiscoveryRecord;
  // null when the payload was empty or no strategy could read it
  strategy: DecodeStrategyName | null;
}

interface DecodeStrategy {
  name: DecodeStrategyName;
  // Returns null to hand the payload to the next strategy
  decode(payload: Uint8Array): RouteDiscoveryRecord | null;
}

const SNR_SCALE = 4.0;

export function emptyRouteDiscoveryRecord(): RouteDiscoveryRecord {
  return { routeNodes: [], snrTowards: [], routeBack: [], snrBack: [] };
}

const protobufStrategy: DecodeStrategy = {
  name: 'protobuf',
  decode(payload) {
    if (!getProtobufRoot()) {
      return null;
    }
    // 0x7b ('{') would be a group start for field 15, which RouteDiscovery never carries
    if (payload[0] === 0x7b) {
      return null;
    }

    try {
      const message = decodeRouteDiscoveryMessage(payload);
      return {
        routeNodes: message.route.map(nodeNum => nodeNum >>> 0),
        snrTowards: message.snrTowards.map(snr => snr / SNR_SCALE),
        routeBack: message.routeBack.map(nodeNum => nodeNum >>> 0),
        snrBack: message.snrBack.map(snr => snr / SNR_SCALE)
      };
    } catch (error) {
      logger.debug('RouteDiscovery protobuf decode failed:', error);
      return null;
    }
  }
};

const JSON_KEYS = ['route_nodes', 'snr_towards', 'route_back', 'snr_back'] as const;

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function coerceNumbers(value: unknown, integer: boolean): number[] {
  if (!Array.isArray(value)) return [];

  const numbers: number[] = [];
  for (const entry of value) {
    if (entry === null || entry === undefined) continue;
    const parsed = typeof entry === 'number' ? entry : Number(entry);
    if (typeof entry === 'boolean' || !Number.isFinite(parsed)) continue;
    numbers.push(integer ? Math.trunc(parsed) >>> 0 : parsed);
  }
  return numbers;
}

const jsonStrategy: DecodeStrategy = {
  name: 'json',
  decode(payload) {
    let parsed: unknown;
    try {
      const text = new TextDecoder('utf-8', { fatal: true }).decode(payload);
      parsed = JSON.parse(text);
    } catch {
      return null;
    }

    if (!isRecordObject(parsed)) {
      return null;
    }
    const fields = parsed;
    if (!JSON_KEYS.some(key => key in fields)) {
      return null;
    }

    return {
      routeNodes: coerceNumbers(fields.route_nodes, true),
      snrTowards: coerceNumbers(fields.snr_towards, false),
      routeBack: coerceNumbers(fields.route_back, true),
      snrBack: coerceNumbers(fields.snr_back, false)
    };
  }
};

class WireReader {
  pos = 0;

  constructor(private readonly buf: Uint8Array) {}

  get done(): boolean {
    return this.pos >= this.buf.length;
  }

  get length(): number {
    return this.buf.length;
  }

  /**
   * Read a varint and return its low 32 bits as a signed integer.
   * Negative int32 values are sign-extended to ten bytes on the wire.
   */
  varint(): number {
    let value = 0;
    let shift = 0;
    for (;;) {
      if (this.pos >= this.buf.length) {
        throw new RangeError(`varint runs past end of payload at offset ${this.pos}`);
      }
      const byte = this.buf[this.pos++];
      if (shift < 32) {
        value |= (byte & 0x7f) << shift;
      }
      if (byte < 0x80) {
        return value;
      }
      shift += 7;
      if (shift >= 70) {
        throw new RangeError(`varint longer than 10 bytes at offset ${this.pos}`);
      }
    }
  }

  fixed32(): number {
    const bytes = this.take(4);
    return bytes[0] | (bytes[1] << 8) | (bytes[2] << 16) | (bytes[3] << 24);
  }

  take(length: number): Uint8Array {
    if (length < 0 || this.pos + length > this.buf.length) {
      throw new RangeError(`field of ${length} bytes runs past end of payload at offset ${this.pos}`);
    }
    const slice = this.buf.subarray(this.pos, this.pos + length);
    this.pos += length;
    return slice;
  }

  skip(wireType: number): void {
    switch (wireType) {
      case 0:
        this.varint();
        return;
      case 1:
        this.take(8);
        return;
      case 2:
        this.take(this.varint() >>> 0);
        return;
      case 5:
        this.take(4);
        return;
      default:
        throw new Error(`unsupported wire type ${wireType} at offset ${this.pos}`);
    }
  }
}

/**
 * Read one occurrence of a repeated scalar. Route fields are `fixed32`, so a
 * packed run whose length is a multiple of 4 holds fixed32 entries; any other
 * length is read as varints.
 */
function readRepeated(reader: WireReader, wireType: number, fixedWidth = false): number[] {
  if (wireType === 0) {
    return [reader.varint()];
  }
  if (wireType === 5) {
    return [reader.fixed32()];
  }
  if (wireType === 2) {
    const packed = new WireReader(reader.take(reader.varint() >>> 0));
    const readFixed = fixedWidth && packed.length % 4 === 0;
    const values: number[] = [];
    while (!packed.done) {
      values.push(readFixed ? packed.fixed32() : packed.varint());
    }
    return values;
  }
  throw new Error(`unexpected wire type ${wireType} for a repeated scalar`);
}

const wireStrategy: DecodeStrategy = {
  name: 'wire',
  decode(payload) {
    const record = emptyRouteDiscoveryRecord();
    const reader = new WireReader(payload);
    let accumulated = false;

    try {
      while (!reader.done) {
        const tag = reader.varint() >>> 0;
        const fieldNumber = tag >>> 3;
        const wireType = tag & 0x7;

        switch (fieldNumber) {
          case 1:
            record.routeNodes.push(...readRepeated(reader, wireType, true).map(value => value >>> 0));
            break;
          case 2:
            record.snrTowards.push(...readRepeated(reader, wireType).map(value => value / SNR_SCALE));
            break;
          case 3:
            record.routeBack.push(...readRepeated(reader, wireType, true).map(value => value >>> 0));
            break;
          case 4:
            record.snrBack.push(...readRepeated(reader, wireType).map(value => value / SNR_SCALE));
            break;
          default:
            reader.skip(wireType);
        }
        accumulated = true;
      }
    } catch (error) {
      if (!accumulated) {
        logger.debug('RouteDiscovery wire walk failed:', error);
        return null;
      }
      logger.debug('RouteDiscovery wire walk stopped early, keeping partial record:', error);
    }

    return record;
  }
};

const STRATEGIES: readonly DecodeStrategy[] = [protobufStrategy, jsonStrategy, wireStrategy];

export function decodeRouteDiscoveryWithStrategy(payload: Uint8Array | null | undefined): RouteDiscoveryDecodeResult {
  if (!payload || payload.length === 0) {
    return { record: emptyRouteDiscoveryRecord(), strategy: null };
  }

  for (const strategy of STRATEGIES) {
    const record = strategy.decode(payload);
    if (record) {
      return { record, strategy: strategy.name };
    }
  }

  logger.warn(`⚠️ Could not decode RouteDiscovery payload of ${payload.length} bytes`);
  return { record: emptyRouteDiscoveryRecord(), strategy: null };
}

/**
 * Decode a traceroute payload. Never throws; unreadable payloads give an
 * empty record.
 */
export function decodeRouteDiscovery(payload: Uint8Array | null | undefined): RouteDiscoveryRecord {
  return decodeRouteDiscoveryWithStrategy(payload).record;
}
