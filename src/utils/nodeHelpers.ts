export const BROADCAST_NODE_NUM = 0xffffffff;

/**
 * Format a node number as the Meshtastic node id string, e.g. `!a1b2c3d4`.
 */
export function formatNodeId(nodeNum: number): string {
  return `!${(nodeNum >>> 0).toString(16).padStart(8, '0')}`;
}

/**
 * Parse a node reference into a node number.
 *
 * Accepts numbers, decimal strings, `!hex` ids and bare hex strings.
 * Returns null when the value cannot name a uint32 node.
 */
export function parseNodeNum(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 && value <= BROADCAST_NODE_NUM ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  let parsed: number;
  if (trimmed.startsWith('!')) {
    parsed = /^[0-9a-fA-F]{1,8}$/.test(trimmed.slice(1)) ? parseInt(trimmed.slice(1), 16) : NaN;
  } else if (/^\d+$/.test(trimmed)) {
    parsed = parseInt(trimmed, 10);
  } else if (/^[0-9a-fA-F]{1,8}$/.test(trimmed)) {
    parsed = parseInt(trimmed, 16);
  } else {
    parsed = NaN;
  }

  if (isNaN(parsed) || parsed > BROADCAST_NODE_NUM) {
    return null;
  }
  return parsed;
}

/**
 * Node number of a gateway from its `!hex` id; null for other topic ids.
 */
export function gatewayNodeNum(gatewayId: string | null): number | null {
  if (!gatewayId?.startsWith('!')) {
    return null;
  }
  return parseNodeNum(gatewayId);
}

/**
 * Display name for a node, falling back to its `!hex` id.
 */
export function resolveNodeName(names: ReadonlyMap<number, string> | undefined, nodeNum: number): string {
  return names?.get(nodeNum) ?? formatNodeId(nodeNum);
}
