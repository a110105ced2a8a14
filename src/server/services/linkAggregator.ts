/**
 * Link Aggregator
 *
 * Folds RF hops from many traceroute packets into per-link statistics (one
 * entry per unordered node pair) and per-path statistics (one entry per
 * directed first-sender / last-receiver pair of a multi-hop RF path).
 *
 * An aggregator lives for one analysis call. Feed packets oldest first so the
 * recent-packet rings keep the newest ids.
 */
import type { TraceroutePacket } from '../models/traceroutePacket.js';
import type {
  DirectLinkResult,
  IndirectLinkResult,
  LinkCriteria,
  TracerouteHop
} from '../../types/traceroute.js';
import { BROADCAST_NODE_NUM } from '../../utils/nodeHelpers.js';
import { RecentRing } from '../../utils/recentRing.js';

export const RECENT_PACKET_LIMIT = 5;
export const ROUTE_PREVIEW_LIMIT = 10;

export interface PacketRef {
  id: number;
  timestamp: number;
}

interface AggregateBase {
  fromNodeNum: number;
  toNodeNum: number;
  fromNodeName: string;
  toNodeName: string;
  tracerouteCount: number;
  totalDistanceKm: number;
  totalSnr: number;
  maxDistanceKm: number;
  recentPacketIds: RecentRing<number>;
  lastSeen: number;
  lastPacketId: number;
}

export interface LinkStatistic extends AggregateBase {
  bestSnr: number;
}

export interface PathStatistic extends AggregateBase {
  hopCountTotal: number;
  routePreview: string[];
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function touch(stat: AggregateBase, packet: PacketRef): void {
  stat.recentPacketIds.push(packet.id);
  if (packet.timestamp >= stat.lastSeen) {
    stat.lastSeen = packet.timestamp;
    stat.lastPacketId = packet.id;
  }
}

function packetUrl(packetId: number): string {
  return `/packet/${packetId}`;
}

export class LinkAggregator {
  private readonly links = new Map<string, LinkStatistic>();
  private readonly paths = new Map<string, PathStatistic>();

  constructor(private readonly criteria: LinkCriteria) {}

  /** Key shared by A→B and B→A. */
  static linkKey(nodeA: number, nodeB: number): string {
    return nodeA <= nodeB ? `${nodeA}-${nodeB}` : `${nodeB}-${nodeA}`;
  }

  get linkCount(): number {
    return this.links.size;
  }

  get pathCount(): number {
    return this.paths.size;
  }

  /**
   * Count one RF hop towards its link. Returns false when the hop does not
   * pass the criteria or cannot be placed on a map.
   */
  recordHop(hop: TracerouteHop, packet: PacketRef): boolean {
    const { snr, distanceKm, fromNodeNum, toNodeNum } = hop;
    if (snr === null || snr === 0 || snr < this.criteria.minSnr) return false;
    if (distanceKm === null || distanceKm < this.criteria.minDistanceKm) return false;
    if (fromNodeNum === toNodeNum) return false;
    if (fromNodeNum === BROADCAST_NODE_NUM || toNodeNum === BROADCAST_NODE_NUM) return false;

    const key = LinkAggregator.linkKey(fromNodeNum, toNodeNum);
    let stat = this.links.get(key);
    if (!stat) {
      stat = {
        fromNodeNum,
        toNodeNum,
        fromNodeName: hop.fromNodeName,
        toNodeName: hop.toNodeName,
        tracerouteCount: 0,
        totalDistanceKm: 0,
        totalSnr: 0,
        maxDistanceKm: 0,
        bestSnr: snr,
        recentPacketIds: new RecentRing<number>(RECENT_PACKET_LIMIT),
        lastSeen: packet.timestamp,
        lastPacketId: packet.id
      };
      this.links.set(key, stat);
    }

    stat.tracerouteCount++;
    stat.totalDistanceKm += distanceKm;
    stat.totalSnr += snr;
    stat.maxDistanceKm = Math.max(stat.maxDistanceKm, distanceKm);
    stat.bestSnr = Math.max(stat.bestSnr, snr);
    touch(stat, packet);
    return true;
  }

  /**
   * Count one multi-hop RF path (hops of a single direction, in order).
   * Hops without a known distance add nothing to the path length.
   */
  recordPath(hops: TracerouteHop[], packet: PacketRef): boolean {
    if (hops.length < 2) return false;

    const first = hops[0];
    const last = hops[hops.length - 1];
    if (first.fromNodeNum === last.toNodeNum) return false;

    const pathDistanceKm = hops.reduce((sum, hop) => sum + (hop.distanceKm ?? 0), 0);
    if (pathDistanceKm < this.criteria.minDistanceKm) return false;

    const snrs = hops.flatMap(hop => (hop.snr === null ? [] : [hop.snr]));
    if (snrs.length === 0) return false;
    const avgSnr = snrs.reduce((sum, snr) => sum + snr, 0) / snrs.length;
    if (avgSnr < this.criteria.minSnr) return false;

    const key = `${first.fromNodeNum}>${last.toNodeNum}`;
    let stat = this.paths.get(key);
    if (!stat) {
      stat = {
        fromNodeNum: first.fromNodeNum,
        toNodeNum: last.toNodeNum,
        fromNodeName: first.fromNodeName,
        toNodeName: last.toNodeName,
        tracerouteCount: 0,
        totalDistanceKm: 0,
        totalSnr: 0,
        maxDistanceKm: 0,
        hopCountTotal: 0,
        routePreview: [...hops.map(hop => hop.fromNodeName), last.toNodeName].slice(0, ROUTE_PREVIEW_LIMIT),
        recentPacketIds: new RecentRing<number>(RECENT_PACKET_LIMIT),
        lastSeen: packet.timestamp,
        lastPacketId: packet.id
      };
      this.paths.set(key, stat);
    }

    stat.tracerouteCount++;
    stat.totalDistanceKm += pathDistanceKm;
    stat.hopCountTotal += hops.length;
    stat.totalSnr += avgSnr;
    stat.maxDistanceKm = Math.max(stat.maxDistanceKm, pathDistanceKm);
    touch(stat, packet);
    return true;
  }

  /**
   * Fold a packet whose hop distances have already been calculated.
   */
  addPacket(packet: TraceroutePacket): void {
    const ref: PacketRef = { id: packet.id, timestamp: packet.timestamp };
    const rfPaths = packet.getRfPaths();

    for (const hop of [...rfPaths.forward, ...rfPaths.return]) {
      this.recordHop(hop, ref);
    }
    this.recordPath(rfPaths.forward, ref);
    this.recordPath(rfPaths.return, ref);
  }

  getLinkStatistic(nodeA: number, nodeB: number): LinkStatistic | undefined {
    return this.links.get(LinkAggregator.linkKey(nodeA, nodeB));
  }

  getPathStatistic(fromNodeNum: number, toNodeNum: number): PathStatistic | undefined {
    return this.paths.get(`${fromNodeNum}>${toNodeNum}`);
  }

  /** Direct links, longest average distance first, capped at maxResults. */
  getDirectLinks(): DirectLinkResult[] {
    return [...this.links.values()]
      .map(stat => ({ stat, avgDistanceKm: stat.totalDistanceKm / stat.tracerouteCount }))
      .sort((a, b) => b.avgDistanceKm - a.avgDistanceKm)
      .slice(0, this.criteria.maxResults)
      .map(({ stat, avgDistanceKm }) => ({
        from_node_id: stat.fromNodeNum,
        to_node_id: stat.toNodeNum,
        from_node_name: stat.fromNodeName,
        to_node_name: stat.toNodeName,
        distance_km: round(avgDistanceKm, 2),
        max_distance_km: round(stat.maxDistanceKm, 2),
        avg_snr: round(stat.totalSnr / stat.tracerouteCount, 1),
        best_snr: round(stat.bestSnr, 1),
        traceroute_count: stat.tracerouteCount,
        recent_packets: stat.recentPacketIds.toArray().reverse(),
        packet_id: stat.lastPacketId,
        packet_url: packetUrl(stat.lastPacketId),
        last_seen: stat.lastSeen
      }));
  }

  /** Multi-hop paths, longest average total distance first, capped at maxResults. */
  getIndirectLinks(): IndirectLinkResult[] {
    return [...this.paths.values()]
      .map(stat => ({ stat, avgDistanceKm: stat.totalDistanceKm / stat.tracerouteCount }))
      .sort((a, b) => b.avgDistanceKm - a.avgDistanceKm)
      .slice(0, this.criteria.maxResults)
      .map(({ stat, avgDistanceKm }) => ({
        from_node_id: stat.fromNodeNum,
        to_node_id: stat.toNodeNum,
        from_node_name: stat.fromNodeName,
        to_node_name: stat.toNodeName,
        total_distance_km: round(avgDistanceKm, 2),
        max_distance_km: round(stat.maxDistanceKm, 2),
        hop_count: Math.round(stat.hopCountTotal / stat.tracerouteCount),
        avg_snr: round(stat.totalSnr / stat.tracerouteCount, 1),
        traceroute_count: stat.tracerouteCount,
        route_preview: stat.routePreview,
        recent_packets: stat.recentPacketIds.toArray().reverse(),
        packet_id: stat.lastPacketId,
        packet_url: packetUrl(stat.lastPacketId),
        last_seen: stat.lastSeen
      }));
  }
}
