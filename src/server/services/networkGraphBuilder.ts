/**
 * Network Graph Builder
 *
 * Turns RF hops into a node/link graph for visualization. Links are
 * undirected; indirect connections join the two ends of a multi-hop RF path
 * that were never heard directly.
 */
import type { TraceroutePacket } from '../models/traceroutePacket.js';
import type {
  GraphIndirectConnection,
  GraphLink,
  GraphNode,
  NetworkGraph,
  NetworkGraphStats,
  NodeLocation,
  TracerouteHop
} from '../../types/traceroute.js';
import { BROADCAST_NODE_NUM } from '../../utils/nodeHelpers.js';
import { LinkAggregator } from './linkAggregator.js';

// A minimum SNR of -200 dB disables SNR filtering
export const NO_SNR_LIMIT = -200;

export interface NetworkGraphOptions {
  hours: number;
  minSnr: number;
  includeIndirect: boolean;
}

interface NodeAccumulator {
  id: number;
  name: string;
  packetCount: number;
  totalSnr: number;
  snrCount: number;
  connections: Set<number>;
  lastSeen: number;
}

interface LinkAccumulator {
  source: number;
  target: number;
  totalSnr: number;
  packetCount: number;
  lastSeen: number;
  lastPacketId: number;
}

interface IndirectAccumulator {
  source: number;
  target: number;
  hopCount: number;
  pathCount: number;
  avgSnr: number | null;
  lastSeen: number;
  lastPacketId: number;
}

function clamp(min: number, max: number, value: number): number {
  return Math.min(max, Math.max(min, value));
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export class NetworkGraphBuilder {
  private readonly nodes = new Map<number, NodeAccumulator>();
  private readonly links = new Map<string, LinkAccumulator>();
  private readonly indirect = new Map<string, IndirectAccumulator>();
  private readonly stats: NetworkGraphStats = {
    packets_analyzed: 0,
    packets_with_rf_hops: 0,
    total_rf_hops: 0,
    links_found: 0,
    links_filtered_by_snr: 0,
    links_filtered_due_to_snr_0: 0
  };

  constructor(private readonly options: NetworkGraphOptions) {}

  /** Count a fetched packet that could not be turned into hops. */
  skipPacket(): void {
    this.stats.packets_analyzed++;
  }

  addPacket(packet: TraceroutePacket): void {
    this.stats.packets_analyzed++;

    for (const hop of packet.getAllHops()) {
      if (hop.snr === 0) {
        this.stats.links_filtered_due_to_snr_0++;
      }
    }

    const rfPaths = packet.getRfPaths();
    const rfHops = [...rfPaths.forward, ...rfPaths.return];
    if (rfHops.length === 0) {
      return;
    }

    this.stats.packets_with_rf_hops++;
    this.stats.total_rf_hops += rfHops.length;

    for (const hop of rfHops) {
      this.addHop(hop, packet);
    }

    if (this.options.includeIndirect) {
      this.addIndirect(rfPaths.forward, packet);
      this.addIndirect(rfPaths.return, packet);
    }
  }

  private addHop(hop: TracerouteHop, packet: TraceroutePacket): void {
    const snr = hop.snr;
    if (snr === null || (this.options.minSnr !== NO_SNR_LIMIT && snr < this.options.minSnr)) {
      this.stats.links_filtered_by_snr++;
      return;
    }
    if (hop.fromNodeNum === BROADCAST_NODE_NUM || hop.toNodeNum === BROADCAST_NODE_NUM) return;
    if (hop.fromNodeNum === hop.toNodeNum) return;

    const from = this.touchNode(hop.fromNodeNum, hop.fromNodeName, packet.timestamp);
    const to = this.touchNode(hop.toNodeNum, hop.toNodeName, packet.timestamp);
    from.connections.add(to.id);
    to.connections.add(from.id);
    from.totalSnr += snr;
    from.snrCount++;

    const key = LinkAggregator.linkKey(hop.fromNodeNum, hop.toNodeNum);
    const link = this.links.get(key);
    if (!link) {
      this.links.set(key, {
        source: Math.min(hop.fromNodeNum, hop.toNodeNum),
        target: Math.max(hop.fromNodeNum, hop.toNodeNum),
        totalSnr: snr,
        packetCount: 1,
        lastSeen: packet.timestamp,
        lastPacketId: packet.id
      });
      this.stats.links_found++;
      return;
    }

    link.totalSnr += snr;
    link.packetCount++;
    if (packet.timestamp > link.lastSeen) {
      link.lastSeen = packet.timestamp;
      link.lastPacketId = packet.id;
    }
  }

  private touchNode(nodeNum: number, name: string, timestamp: number): NodeAccumulator {
    let node = this.nodes.get(nodeNum);
    if (!node) {
      node = {
        id: nodeNum,
        name,
        packetCount: 0,
        totalSnr: 0,
        snrCount: 0,
        connections: new Set<number>(),
        lastSeen: timestamp
      };
      this.nodes.set(nodeNum, node);
    }
    node.packetCount++;
    node.lastSeen = Math.max(node.lastSeen, timestamp);
    return node;
  }

  private addIndirect(hops: TracerouteHop[], packet: TraceroutePacket): void {
    if (hops.length < 2) return;

    const source = hops[0].fromNodeNum;
    const target = hops[hops.length - 1].toNodeNum;
    if (source === target || source === BROADCAST_NODE_NUM || target === BROADCAST_NODE_NUM) return;

    const key = LinkAggregator.linkKey(source, target);
    const existing = this.indirect.get(key);
    if (existing) {
      existing.pathCount++;
      if (packet.timestamp > existing.lastSeen) {
        existing.lastSeen = packet.timestamp;
        existing.lastPacketId = packet.id;
      }
      return;
    }

    const snrs = hops.flatMap(hop => (hop.snr === null ? [] : [hop.snr]));
    this.indirect.set(key, {
      source: Math.min(source, target),
      target: Math.max(source, target),
      hopCount: hops.length,
      pathCount: 1,
      avgSnr: snrs.length > 0 ? snrs.reduce((sum, snr) => sum + snr, 0) / snrs.length : null,
      lastSeen: packet.timestamp,
      lastPacketId: packet.id
    });
  }

  /** Nodes that made it into the graph, for the location lookup. */
  getNodeNums(): number[] {
    return [...this.nodes.keys()];
  }

  build(locations: ReadonlyMap<number, NodeLocation> = new Map()): NetworkGraph {
    const nodes: GraphNode[] = [...this.nodes.values()].map(node => {
      const graphNode: GraphNode = {
        id: node.id,
        name: node.name,
        packet_count: node.packetCount,
        connections: node.connections.size,
        avg_snr: node.snrCount > 0 ? round1(node.totalSnr / node.snrCount) : null,
        last_seen: node.lastSeen,
        size: clamp(5, 20, 3 * Math.log10(node.packetCount + 1))
      };

      const location = locations.get(node.id);
      if (location) {
        graphNode.location = {
          latitude: location.latitude,
          longitude: location.longitude,
          altitude: location.altitude ?? null
        };
      }
      return graphNode;
    });

    const links: GraphLink[] = [...this.links.values()].map((link): GraphLink => {
      const avgSnr = link.totalSnr / link.packetCount;
      return {
        source: link.source,
        target: link.target,
        type: 'direct',
        avg_snr: round1(avgSnr),
        packet_count: link.packetCount,
        strength: round1(clamp(1, 10, (avgSnr + 20) / 5 + Math.log10(link.packetCount))),
        last_seen: link.lastSeen,
        last_packet_id: link.lastPacketId
      };
    });

    const indirectConnections: GraphIndirectConnection[] = [];
    if (this.options.includeIndirect) {
      for (const [key, connection] of this.indirect) {
        if (this.links.has(key)) continue;
        indirectConnections.push({
          source: connection.source,
          target: connection.target,
          type: 'indirect',
          hop_count: connection.hopCount,
          path_count: connection.pathCount,
          avg_snr: connection.avgSnr === null ? null : round1(connection.avgSnr),
          strength: clamp(0.5, 5, connection.pathCount / connection.hopCount),
          last_seen: connection.lastSeen,
          last_packet_id: connection.lastPacketId
        });
      }
    }

    return {
      nodes,
      links,
      indirect_connections: indirectConnections,
      stats: { ...this.stats },
      filters: {
        hours: this.options.hours,
        min_snr: this.options.minSnr,
        include_indirect: this.options.includeIndirect
      }
    };
  }
}
