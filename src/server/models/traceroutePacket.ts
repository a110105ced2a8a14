import { decodeRouteDiscovery } from '../routeDiscoveryDecoder.js';
import type { LocationResolver } from '../services/locationResolver.js';
import type {
  HopDirection,
  ResolvedLocation,
  RouteDiscoveryRecord,
  TracerouteHop,
  TraceroutePacketRow,
  TraceroutePathSummary
} from '../../types/traceroute.js';
import { calculateDistance } from '../../utils/distance.js';
import { logger } from '../../utils/logger.js';
import { formatNodeId, gatewayNodeNum, resolveNodeName } from '../../utils/nodeHelpers.js';

export interface TraceroutePacketOptions {
  // Skips decoding rawPayload when the caller already has the record
  record?: RouteDiscoveryRecord;
  nodeNames?: ReadonlyMap<number, string>;
}

export type PathDisplayMode = 'display' | 'return' | 'rf' | 'ids';

export interface RfPaths {
  forward: TracerouteHop[];
  return: TracerouteHop[];
}

const PATH_SEPARATOR = ' → ';

/**
 * A hop is RF when the receiving radio reported an SNR for it. Zero is what
 * firmware records for hops it relayed without measuring.
 */
export function isRfSnr(snr: number | null): snr is number {
  return snr !== null && snr !== 0;
}

/**
 * One traceroute packet with its forward and return hops.
 */
export class TraceroutePacket {
  readonly id: number;
  readonly timestamp: number;
  readonly fromNodeNum: number;
  readonly toNodeNum: number;
  readonly gatewayId: string | null;
  readonly hopStart: number | null;
  readonly hopLimit: number | null;
  readonly record: RouteDiscoveryRecord;

  private readonly nodeNames: ReadonlyMap<number, string> | undefined;
  private readonly forwardHops: TracerouteHop[];
  private readonly returnHops: TracerouteHop[];

  constructor(row: TraceroutePacketRow, options: TraceroutePacketOptions = {}) {
    if (row.fromNodeNum === null || row.toNodeNum === null) {
      throw new Error(`Traceroute packet ${row.id} is missing its source or destination node`);
    }

    this.id = row.id;
    this.timestamp = row.timestamp;
    this.fromNodeNum = row.fromNodeNum;
    this.toNodeNum = row.toNodeNum;
    this.gatewayId = row.gatewayId;
    this.hopStart = row.hopStart ?? null;
    this.hopLimit = row.hopLimit ?? null;
    this.nodeNames = options.nodeNames;
    this.record = options.record ?? decodeRouteDiscovery(row.rawPayload);

    this.forwardHops = this.buildHops(this.getForwardNodes(), this.record.snrTowards, 'forward');
    this.returnHops = this.hasReturnPath()
      ? this.buildHops(this.getReturnNodes(), this.record.snrBack, 'return')
      : [];
  }

  private buildHops(nodes: number[], snrs: number[], direction: 'forward' | 'return'): TracerouteHop[] {
    const hops: TracerouteHop[] = [];
    for (let i = 0; i < nodes.length - 1; i++) {
      const snr = i < snrs.length ? snrs[i] : null;
      const hopDirection: HopDirection = isRfSnr(snr) ? `${direction}_rf` : `${direction}_relay`;
      hops.push({
        hopNumber: i + 1,
        fromNodeNum: nodes[i],
        toNodeNum: nodes[i + 1],
        fromNodeName: this.nodeName(nodes[i]),
        toNodeName: this.nodeName(nodes[i + 1]),
        snr,
        direction: hopDirection,
        distanceKm: null
      });
    }
    return hops;
  }

  private nodeName(nodeNum: number): string {
    return resolveNodeName(this.nodeNames, nodeNum);
  }

  /** Source, intermediate nodes, destination. */
  getForwardNodes(): number[] {
    return [this.fromNodeNum, ...this.record.routeNodes, this.toNodeNum];
  }

  /** Destination, return intermediates, source; empty without a return path. */
  getReturnNodes(): number[] {
    if (!this.hasReturnPath()) return [];
    return [this.toNodeNum, ...this.record.routeBack, this.fromNodeNum];
  }

  hasReturnPath(): boolean {
    return this.record.routeBack.length > 0;
  }

  isComplete(): boolean {
    return this.record.snrTowards.length === this.record.routeNodes.length + 1;
  }

  isReturnComplete(): boolean {
    return this.hasReturnPath() && this.record.snrBack.length === this.record.routeBack.length + 1;
  }

  getCompletionStatus(): string {
    if (!this.hasReturnPath()) {
      return this.isComplete() ? 'Complete' : 'Incomplete - Final destination not reached';
    }
    const forwardStatus = this.isComplete() ? 'Forward complete' : 'Forward incomplete';
    const returnStatus = this.isReturnComplete() ? 'Return complete' : 'Return in progress';
    return `${forwardStatus}, ${returnStatus}`;
  }

  getDisplayHops(): TracerouteHop[] {
    return this.forwardHops;
  }

  getReturnHops(): TracerouteHop[] {
    return this.returnHops;
  }

  getAllHops(): TracerouteHop[] {
    return [...this.forwardHops, ...this.returnHops];
  }

  getRfPaths(): RfPaths {
    return {
      forward: this.forwardHops.filter(hop => isRfSnr(hop.snr)),
      return: this.returnHops.filter(hop => isRfSnr(hop.snr))
    };
  }

  getRfHops(): TracerouteHop[] {
    const { forward, return: back } = this.getRfPaths();
    return [...forward, ...back];
  }

  /**
   * Fill distanceKm (and the age warnings) of every RF hop from the node
   * positions at the time of this packet. Hops with an unknown endpoint
   * position keep a null distance.
   */
  calculateHopDistances(resolver: LocationResolver): void {
    if (!this.timestamp) {
      logger.warn(`Traceroute packet ${this.id} has no timestamp, skipping distance calculation`);
      return;
    }

    const locations = new Map<number, ResolvedLocation | null>();
    const locate = (nodeNum: number): ResolvedLocation | null => {
      if (!locations.has(nodeNum)) {
        locations.set(nodeNum, resolver.lookup(nodeNum, this.timestamp));
      }
      return locations.get(nodeNum) ?? null;
    };

    for (const hop of this.getRfHops()) {
      const from = locate(hop.fromNodeNum);
      const to = locate(hop.toNodeNum);
      if (!from || !to) continue;

      hop.distanceKm = calculateDistance(from.latitude, from.longitude, to.latitude, to.longitude);
      hop.fromLocationAgeWarning = from.ageWarning;
      hop.toLocationAgeWarning = to.ageWarning;
    }
  }

  formatPathDisplay(mode: PathDisplayMode = 'display'): string {
    let labels: string[];
    switch (mode) {
      case 'display':
        labels = this.getForwardNodes().map(nodeNum => this.nodeName(nodeNum));
        break;
      case 'return':
        labels = this.getReturnNodes().map(nodeNum => this.nodeName(nodeNum));
        break;
      case 'rf':
        labels = this.getRfChain().map(nodeNum => this.nodeName(nodeNum));
        break;
      case 'ids':
        labels = this.getForwardNodes().map(formatNodeId);
        break;
    }
    return labels.length > 0 ? labels.join(PATH_SEPARATOR) : 'No path data';
  }

  /** Node sequence traced by consecutive RF hops, without repeating shared endpoints. */
  getRfChain(): number[] {
    const chain: number[] = [];
    for (const hop of this.getRfHops()) {
      if (chain[chain.length - 1] !== hop.fromNodeNum) {
        chain.push(hop.fromNodeNum);
      }
      chain.push(hop.toNodeNum);
    }
    return chain;
  }

  private findRfHop(nodeA: number, nodeB: number): TracerouteHop | undefined {
    return this.getRfHops().find(
      hop =>
        (hop.fromNodeNum === nodeA && hop.toNodeNum === nodeB) ||
        (hop.fromNodeNum === nodeB && hop.toNodeNum === nodeA)
    );
  }

  /** Whether an RF hop between the two nodes, in either direction, was heard. */
  containsHop(nodeA: number, nodeB: number): boolean {
    return this.findRfHop(nodeA, nodeB) !== undefined;
  }

  getHopSnr(nodeA: number, nodeB: number): number | null {
    return this.findRfHop(nodeA, nodeB)?.snr ?? null;
  }

  getGatewayNodeNum(): number | null {
    return gatewayNodeNum(this.gatewayId);
  }

  getPathSummary(): TraceroutePathSummary {
    return {
      packet_id: this.id,
      from_node_id: this.fromNodeNum,
      to_node_id: this.toNodeNum,
      from_node_name: this.nodeName(this.fromNodeNum),
      to_node_name: this.nodeName(this.toNodeNum),
      timestamp: this.timestamp,
      gateway_id: this.gatewayId,
      has_return_path: this.hasReturnPath(),
      is_complete: this.isComplete(),
      forward_hops: this.forwardHops.length,
      return_hops: this.returnHops.length,
      total_rf_hops: this.getRfHops().length,
      route_nodes: this.record.routeNodes,
      route_back: this.record.routeBack,
      snr_towards: this.record.snrTowards,
      snr_back: this.record.snrBack
    };
  }
}
