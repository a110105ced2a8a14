/**
 * Loads and provides access to the Meshtastic protobuf definitions
 */
import protobuf from 'protobufjs';
import path from 'path';
import { logger } from '../utils/logger.js';

let root: protobuf.Root | null = null;

export async function loadProtobufDefinitions(): Promise<protobuf.Root> {
  if (root) {
    return root;
  }

  try {
    const protoRoot = path.join(process.cwd(), 'protobufs');
    const protoPath = path.join(protoRoot, 'meshtastic/mesh.proto');

    const loaded = new protobuf.Root();
    loaded.resolvePath = (origin: string, target: string) => {
      // Imports are written relative to the protobufs/ directory
      if (target.startsWith('meshtastic/')) {
        return path.join(protoRoot, target);
      }
      return path.resolve(path.dirname(origin), target);
    };

    await loaded.load(protoPath);
    root = loaded;

    logger.debug('✅ Successfully loaded Meshtastic protobuf definitions');
    return root;
  } catch (error) {
    logger.error('❌ Failed to load protobuf definitions:', error);
    throw error;
  }
}

export function getProtobufRoot(): protobuf.Root | null {
  return root;
}

// Decoded message shapes, as plain objects with camelCase keys
export interface RouteDiscoveryMessage {
  route: number[];
  snrTowards: number[];
  routeBack: number[];
  snrBack: number[];
}

export interface PositionMessage {
  latitudeI: number | null;
  longitudeI: number | null;
  altitude: number | null;
  time: number | null;
  precisionBits: number | null;
  satsInView: number | null;
}

function requireRoot(): protobuf.Root {
  if (!root) {
    throw new Error('Protobuf definitions not loaded');
  }
  return root;
}

function numberArray(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is number => typeof entry === 'number');
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' ? value : null;
}

/**
 * Decode a RouteDiscovery payload. Throws on malformed input.
 */
export function decodeRouteDiscoveryMessage(payload: Uint8Array): RouteDiscoveryMessage {
  const RouteDiscovery = requireRoot().lookupType('meshtastic.RouteDiscovery');
  const message = RouteDiscovery.decode(payload);
  const object: Record<string, unknown> = RouteDiscovery.toObject(message, { longs: Number, arrays: true });

  return {
    route: numberArray(object.route),
    snrTowards: numberArray(object.snrTowards),
    routeBack: numberArray(object.routeBack),
    snrBack: numberArray(object.snrBack)
  };
}

/**
 * Decode a Position payload. Throws on malformed input.
 */
export function decodePositionMessage(payload: Uint8Array): PositionMessage {
  const Position = requireRoot().lookupType('meshtastic.Position');
  const message = Position.decode(payload);
  const object: Record<string, unknown> = Position.toObject(message, { longs: Number });

  return {
    latitudeI: numberOrNull(object.latitudeI),
    longitudeI: numberOrNull(object.longitudeI),
    altitude: numberOrNull(object.altitude),
    time: numberOrNull(object.time),
    precisionBits: numberOrNull(object.precisionBits),
    satsInView: numberOrNull(object.satsInView)
  };
}

/**
 * Encode a RouteDiscovery message. SNR values are expected already scaled by 4.
 */
export function encodeRouteDiscoveryMessage(message: Partial<RouteDiscoveryMessage>): Uint8Array {
  const RouteDiscovery = requireRoot().lookupType('meshtastic.RouteDiscovery');
  return RouteDiscovery.encode(RouteDiscovery.create(message)).finish();
}

/**
 * Encode a Position message.
 */
export function encodePositionMessage(message: Partial<Record<keyof PositionMessage, number>>): Uint8Array {
  const Position = requireRoot().lookupType('meshtastic.Position');
  return Position.encode(Position.create(message)).finish();
}
