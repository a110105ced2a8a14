/**
 * Combined Route Graph
 *
 * Merges the RF hops of every gateway's reception of one traceroute into a
 * single graph: each reception contributes a path, hops shared between
 * receptions become one edge with an observation count.
 */
import type { TraceroutePacket } from '../models/traceroutePacket.js';
import type {
  CombinedGraphEdge,
  CombinedGraphNode,
  CombinedGraphPath,
  CombinedTracerouteGraph
} from '../../types/traceroute.js';
import { gatewayNodeNum, resolveNodeName } from '../../utils/nodeHelpers.js';
import { LinkAggregator } from './linkAggregator.js';

// Golden-angle hue step keeps neighbouring path colors apart
const PATH_HUE_STEP = 137;

export interface RouteEndpoints {
  source: number | null;
  target: number | null;
}

interface DirectionCount {
  from: number;
  to: number;
  count: number;
}

interface EdgeAccumulator {
  low: number;
  high: number;
  count: number;
  snrValues: number[];
  packetIds: number[];
  directions: Map<string, DirectionCount>;
  paths: Set<number>;
}

interface PathAccumulator {
  packetId: number;
  nodes: number[];
  gatewayId: string | null;
  gatewayNodeNum: number | null;
  timestamp: number;
  snrValues: number[];
}

function mean(values: number[]): number | null {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : null;
}

export class CombinedRouteGraphBuilder {
  private readonly rfNodes = new Set<number>();
  private readonly gateways = new Set<number>();
  private readonly edges = new Map<string, EdgeAccumulator>();
  private readonly paths: PathAccumulator[] = [];
  private receptions = 0;
  private skipped = 0;

  constructor(private readonly endpoints: RouteEndpoints) {}

  /** A reception whose hops could not be read still shows its gateway. */
  skipReception(gatewayId: string | null): void {
    this.receptions++;
    this.skipped++;
    this.addGateway(gatewayNodeNum(gatewayId));
  }

  addPacket(packet: TraceroutePacket): void {
    this.receptions++;
    const gateway = packet.getGatewayNodeNum();
    this.addGateway(gateway);

    const { forward, return: back } = packet.getRfPaths();
    const rfHops = [...forward, ...back];
    if (rfHops.length === 0) {
      return;
    }

    const snrValues: number[] = [];
    for (const hop of rfHops) {
      if (hop.snr !== null) snrValues.push(hop.snr);
      this.rfNodes.add(hop.fromNodeNum);
      this.rfNodes.add(hop.toNodeNum);

      const key = LinkAggregator.linkKey(hop.fromNodeNum, hop.toNodeNum);
      let edge = this.edges.get(key);
      if (!edge) {
        edge = {
          low: Math.min(hop.fromNodeNum, hop.toNodeNum),
          high: Math.max(hop.fromNodeNum, hop.toNodeNum),
          count: 0,
          snrValues: [],
          packetIds: [],
          directions: new Map(),
          paths: new Set()
        };
        this.edges.set(key, edge);
      }

      edge.count++;
      edge.packetIds.push(packet.id);
      edge.paths.add(packet.id);
      if (hop.snr !== null) edge.snrValues.push(hop.snr);
      const directionKey = `${hop.fromNodeNum}-${hop.toNodeNum}`;
      const direction = edge.directions.get(directionKey);
      if (direction) {
        direction.count++;
      } else {
        edge.directions.set(directionKey, { from: hop.fromNodeNum, to: hop.toNodeNum, count: 1 });
      }
    }

    this.paths.push({
      packetId: packet.id,
      nodes: packet.getRfChain(),
      gatewayId: packet.gatewayId,
      gatewayNodeNum: gateway,
      timestamp: packet.timestamp,
      snrValues
    });
  }

  private addGateway(nodeNum: number | null): void {
    if (nodeNum) {
      this.gateways.add(nodeNum);
    }
  }

  /** RF and gateway nodes, for the name lookup. */
  getNodeNums(): number[] {
    return [...new Set([...this.rfNodes, ...this.gateways])];
  }

  build(nodeNames: ReadonlyMap<number, string> = new Map()): CombinedTracerouteGraph {
    const toNode = (id: number): CombinedGraphNode => {
      const isGateway = this.gateways.has(id);
      return {
        id,
        label: resolveNodeName(nodeNames, id),
        type: isGateway ? 'gateway' : 'router',
        is_gateway: isGateway,
        is_source: id === this.endpoints.source,
        is_target: id === this.endpoints.target
      };
    };
    const nodes = [
      ...[...this.rfNodes].map(toNode),
      ...[...this.gateways].filter(id => !this.rfNodes.has(id)).map(toNode)
    ];

    const edges = [...this.edges.values()].map((edge): CombinedGraphEdge => {
      const avgSnr = mean(edge.snrValues);
      const lowName = resolveNodeName(nodeNames, edge.low);
      const highName = resolveNodeName(nodeNames, edge.high);

      const titleParts = [`Observations: ${edge.count}`];
      if (avgSnr !== null) titleParts.push(`Avg SNR: ${avgSnr.toFixed(1)} dB`);
      titleParts.push(`${lowName} ↔ ${highName}`);

      // Ties keep the direction heard first
      let primary: DirectionCount = { from: edge.low, to: edge.high, count: 0 };
      const directionCounts: Record<string, number> = {};
      for (const [key, direction] of edge.directions) {
        directionCounts[key] = direction.count;
        if (direction.count > primary.count) primary = direction;
      }

      return {
        id: `${lowName}-${highName}`,
        from: primary.from,
        to: primary.to,
        value: edge.count,
        label: edge.count > 1 ? `${edge.count}x` : '',
        title: titleParts.join(' | '),
        is_bidirectional: edge.directions.size > 1,
        packet_ids: edge.packetIds,
        direction_counts: directionCounts,
        avg_snr: avgSnr,
        paths: [...edge.paths]
      };
    });

    const paths = this.paths.map(
      (path, index): CombinedGraphPath => ({
        packet_id: path.packetId,
        nodes: path.nodes,
        color: `hsl(${(index * PATH_HUE_STEP) % 360}, 80%, 60%)`,
        gateway_id: path.gatewayId,
        gateway_node_id: path.gatewayNodeNum,
        timestamp: path.timestamp,
        avg_snr: mean(path.snrValues),
        hop_count: path.nodes.length > 0 ? path.nodes.length - 1 : 0
      })
    );

    return {
      nodes,
      edges,
      paths,
      stats: {
        receptions: this.receptions,
        receptions_with_rf_hops: this.paths.length,
        receptions_skipped: this.skipped
      }
    };
  }
}
