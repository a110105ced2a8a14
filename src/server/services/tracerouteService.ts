/**
 * Traceroute Service
 *
 * Entry point for traceroute queries and RF link analysis. Reads packets from
 * the store, wraps them in TraceroutePacket models and hands them to the link
 * aggregator or the graph builder.
 */
import { getEnvironmentConfig } from '../config/environment.js';
import { TraceroutePacket } from '../models/traceroutePacket.js';
import { decodeRouteDiscoveryWithStrategy } from '../routeDiscoveryDecoder.js';
import { getDatabaseService } from '../../services/database.js';
import type {
  CombinedTracerouteGraph,
  LinkCriteria,
  LocationFix,
  LongestLinksAnalysis,
  NetworkGraph,
  NodeLocation,
  RouteDiscoveryRecord,
  TracerouteHop,
  TraceroutePacketQuery,
  TraceroutePacketRow,
  TraceroutePathSummary,
  TracerouteStore
} from '../../types/traceroute.js';
import { calculateDistance, formatDistance } from '../../utils/distance.js';
import { logger } from '../../utils/logger.js';
import { BROADCAST_NODE_NUM, formatNodeId, resolveNodeName } from '../../utils/nodeHelpers.js';
import { CombinedRouteGraphBuilder } from './combinedRouteGraph.js';
import { LinkAggregator } from './linkAggregator.js';
import { DatabaseLocationResolver, PreloadedLocationResolver, type LocationResolver } from './locationResolver.js';
import { NetworkGraphBuilder, NO_SNR_LIMIT } from './networkGraphBuilder.js';

// Map links read the direct graph of at most this many packets
const MAP_LINK_PACKET_LIMIT = 2000;
const MAX_MAP_LINK_HOURS = 168;

// Sample size for the summary statistics
const ANALYSIS_SAMPLE_LIMIT = 1000;
const PATTERN_EXAMPLE_LIMIT = 3;
const TOP_NODES_LIMIT = 10;

/**
 * The analysis could not run at all, as opposed to individual packets being
 * skipped.
 */
export class TracerouteAnalysisError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TracerouteAnalysisError';
  }
}

export interface TracerouteListOptions {
  page?: number;
  perPage?: number;
  gatewayId?: string;
  fromNode?: number;
  toNode?: number;
}

export interface TracerouteListItem extends TraceroutePathSummary {
  hop_start: number | null;
  hop_limit: number | null;
  processed_successfully: boolean;
  completion_status: string;
  display_path: string;
  total_hops: number;
  rf_hops: number;
}

export interface TracerouteList {
  traceroutes: TracerouteListItem[];
  total_count: number;
  page: number;
  per_page: number;
  total_pages: number;
}

export interface TracerouteHopJson {
  hop_number: number;
  from_node_id: number;
  to_node_id: number;
  from_node_name: string;
  to_node_name: string;
  snr: number | null;
  direction: TracerouteHop['direction'];
  distance_km: number | null;
  distance_display: string;
  from_location_age_warning: string | null;
  to_location_age_warning: string | null;
}

export interface TracerouteDetails {
  packet: TraceroutePathSummary;
  completion_status: string;
  is_return_complete: boolean;
  display_path: string;
  return_path: string;
  rf_path: string;
  id_path: string;
  gateway_node_id: number | null;
  forward_hops: TracerouteHopJson[];
  return_hops: TracerouteHopJson[];
  rf_hops: TracerouteHopJson[];
}

export interface TracerouteAnalysis {
  time_period_hours: number;
  total_traceroutes: number;
  successful_traceroutes: number;
  success_rate: number;
  traceroutes_with_return: number;
  return_path_rate: number;
  unique_routes: number;
  avg_route_length: number;
  top_participating_nodes: Array<{ node_id: number; node_name: string; participation_count: number }>;
}

export interface RoutePattern {
  count: number;
  endpoints: [number, number];
  route_nodes: number[];
  endpoints_names: string[];
  route_nodes_names: string[];
  route_display: string;
  examples: Array<{ packet_id: number; timestamp: number; from_node: number; to_node: number }>;
}

export interface RoutePatterns {
  patterns: RoutePattern[];
  total_patterns: number;
  analyzed_traceroutes: number;
}

interface RoleStats {
  total: number;
  successful: number;
  success_rate: number;
}

export interface NodeTracerouteStats {
  node_id: number;
  node_name: string;
  as_source: RoleStats;
  as_destination: RoleStats;
  as_intermediate_hop: { participation_count: number };
  total_involvement: number;
}

export interface LocationFixJson {
  latitude: number;
  longitude: number;
  altitude: number | null;
  timestamp: number;
  precision_bits: number | null;
  precision_meters: number | null;
  sats_in_view: number | null;
}

export interface NodeLocationJson extends LocationFixJson {
  node_id: number;
  hex_id: string;
  display_name: string;
  long_name: string | null;
  short_name: string | null;
  hw_model: string | null;
  role: string | null;
}

export interface CombinedTracerouteGraphResult extends CombinedTracerouteGraph {
  packet_id: number;
}

export interface TracerouteMapLink {
  from_node_id: number;
  to_node_id: number;
  success_rate: number;
  avg_snr: number;
  age_hours: number;
  last_seen: number;
  last_seen_str: string;
  is_bidirectional: boolean;
  total_hops_seen: number;
  last_packet_id: number;
}

export interface NodeNeighbor {
  node_id: number;
  display_name: string;
  distance_km: number;
  distance_meters: number;
  location: {
    latitude: number;
    longitude: number;
    altitude: number | null;
  };
  hw_model: string | null;
  last_updated: number;
}

export interface LongestLinksOptions {
  // Replaces the preloaded resolver built from the store
  locationResolver?: LocationResolver;
}

export interface NetworkGraphQuery {
  hours?: number;
  minSnr?: number;
  includeIndirect?: boolean;
  limitPackets?: number;
}

function nowSeconds(): number {
  return Date.now() / 1000;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

// e.g. 2024-05-01 12:00:00 UTC
function formatUtc(timestamp: number): string {
  return `${new Date(timestamp * 1000).toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

function percentage(part: number, total: number): number {
  return total > 0 ? Math.round((part / total) * 1000) / 10 : 0;
}

function fixToJson(fix: LocationFix): LocationFixJson {
  return {
    latitude: fix.latitude,
    longitude: fix.longitude,
    altitude: fix.altitude ?? null,
    timestamp: fix.timestamp,
    precision_bits: fix.precisionBits ?? null,
    precision_meters: fix.precisionMeters ?? null,
    sats_in_view: fix.satsInView ?? null
  };
}

function nodeLocationToJson(location: NodeLocation): NodeLocationJson {
  return {
    node_id: location.nodeNum,
    hex_id: location.nodeId,
    display_name: location.displayName,
    long_name: location.longName ?? null,
    short_name: location.shortName ?? null,
    hw_model: location.hwModel ?? null,
    role: location.role ?? null,
    ...fixToJson(location)
  };
}

function hopToJson(hop: TracerouteHop): TracerouteHopJson {
  return {
    hop_number: hop.hopNumber,
    from_node_id: hop.fromNodeNum,
    to_node_id: hop.toNodeNum,
    from_node_name: hop.fromNodeName,
    to_node_name: hop.toNodeName,
    snr: hop.snr,
    direction: hop.direction,
    distance_km: hop.distanceKm,
    distance_display: formatDistance(hop.distanceKm),
    from_location_age_warning: hop.fromLocationAgeWarning ?? null,
    to_location_age_warning: hop.toLocationAgeWarning ?? null
  };
}

function roleStats(rows: TraceroutePacketRow[]): RoleStats {
  const successful = rows.filter(row => row.processedSuccessfully).length;
  return { total: rows.length, successful, success_rate: percentage(successful, rows.length) };
}

/** Node numbers a packet touches, broadcast excluded. */
function packetNodeNums(row: TraceroutePacketRow, record: RouteDiscoveryRecord): number[] {
  const nodeNums = [...record.routeNodes, ...record.routeBack];
  if (row.fromNodeNum !== null) nodeNums.push(row.fromNodeNum);
  if (row.toNodeNum !== null) nodeNums.push(row.toNodeNum);
  return nodeNums.filter(nodeNum => nodeNum !== BROADCAST_NODE_NUM);
}

export class TracerouteService {
  constructor(private readonly getStore: () => TracerouteStore = getDatabaseService) {}

  private fetchPackets(query: TraceroutePacketQuery): TraceroutePacketRow[] {
    try {
      return this.getStore().fetchTraceroutePackets(query);
    } catch (error) {
      throw new TracerouteAnalysisError('Failed to fetch traceroute packets', { cause: error });
    }
  }

  private resolveNames(nodeNums: Iterable<number>): Map<number, string> {
    try {
      return this.getStore().bulkResolveNodeNames([...new Set(nodeNums)]);
    } catch (error) {
      throw new TracerouteAnalysisError('Failed to resolve node names', { cause: error });
    }
  }

  /**
   * Paginated traceroute list, newest first.
   */
  getTraceroutes(options: TracerouteListOptions = {}): TracerouteList {
    const page = Math.max(1, options.page ?? 1);
    const perPage = Math.max(1, options.perPage ?? 50);
    const filter = {
      gatewayId: options.gatewayId,
      fromNodeNum: options.fromNode,
      toNodeNum: options.toNode
    };

    const store = this.getStore();
    const rows = store.fetchTraceroutePackets({ ...filter, limit: perPage, offset: (page - 1) * perPage });
    const totalCount = store.countTraceroutePackets(filter);

    const records = new Map<number, RouteDiscoveryRecord>();
    const nodeNums = new Set<number>();
    for (const row of rows) {
      const { record } = decodeRouteDiscoveryWithStrategy(row.rawPayload);
      records.set(row.id, record);
      packetNodeNums(row, record).forEach(nodeNum => nodeNums.add(nodeNum));
    }
    const nodeNames = store.bulkResolveNodeNames([...nodeNums]);

    const traceroutes: TracerouteListItem[] = [];
    for (const row of rows) {
      try {
        const packet = new TraceroutePacket(row, { record: records.get(row.id), nodeNames });
        traceroutes.push({
          ...packet.getPathSummary(),
          hop_start: packet.hopStart,
          hop_limit: packet.hopLimit,
          processed_successfully: row.processedSuccessfully,
          completion_status: packet.getCompletionStatus(),
          display_path: packet.formatPathDisplay('display'),
          total_hops: packet.getDisplayHops().length,
          rf_hops: packet.getRfHops().length
        });
      } catch (error) {
        logger.warn(`Skipping traceroute packet ${row.id} in listing:`, error);
      }
    }

    return {
      traceroutes,
      total_count: totalCount,
      page,
      per_page: perPage,
      total_pages: Math.ceil(totalCount / perPage)
    };
  }

  /**
   * One packet with its hops and the distance of every RF hop.
   * Returns null when no traceroute packet has that id.
   */
  getTracerouteDetails(packetId: number): TracerouteDetails | null {
    const store = this.getStore();
    const row = store.fetchTraceroutePacketById(packetId);
    if (!row) {
      return null;
    }

    const { record } = decodeRouteDiscoveryWithStrategy(row.rawPayload);
    const nodeNames = store.bulkResolveNodeNames(packetNodeNums(row, record));
    const packet = new TraceroutePacket(row, { record, nodeNames });
    packet.calculateHopDistances(new DatabaseLocationResolver(store));

    return {
      packet: packet.getPathSummary(),
      completion_status: packet.getCompletionStatus(),
      is_return_complete: packet.isReturnComplete(),
      display_path: packet.formatPathDisplay('display'),
      return_path: packet.formatPathDisplay('return'),
      rf_path: packet.formatPathDisplay('rf'),
      id_path: packet.formatPathDisplay('ids'),
      gateway_node_id: packet.getGatewayNodeNum(),
      forward_hops: packet.getDisplayHops().map(hopToJson),
      return_hops: packet.getReturnHops().map(hopToJson),
      rf_hops: packet.getRfHops().map(hopToJson)
    };
  }

  getTracerouteAnalysis(hours: number = 24): TracerouteAnalysis {
    logger.info(`Getting traceroute analysis for ${hours} hours`);
    const end = nowSeconds();
    const rows = this.fetchPackets({ startTime: end - hours * 3600, endTime: end, limit: ANALYSIS_SAMPLE_LIMIT });

    let successful = 0;
    let withReturn = 0;
    const routeLengths: number[] = [];
    const uniqueRoutes = new Set<string>();
    const participation = new Map<number, number>();

    for (const row of rows) {
      if (!row.processedSuccessfully) continue;
      successful++;
      if (!row.rawPayload || row.rawPayload.length === 0) continue;

      const { record } = decodeRouteDiscoveryWithStrategy(row.rawPayload);
      if (record.routeBack.length > 0) withReturn++;
      routeLengths.push(record.routeNodes.length);
      uniqueRoutes.add(`${row.fromNodeNum}:${row.toNodeNum}:${record.routeNodes.join(',')}`);

      for (const nodeNum of [row.fromNodeNum, ...record.routeNodes, row.toNodeNum]) {
        if (!nodeNum) continue;
        participation.set(nodeNum, (participation.get(nodeNum) ?? 0) + 1);
      }
    }

    const topNodes = [...participation.entries()].sort((a, b) => b[1] - a[1]).slice(0, TOP_NODES_LIMIT);
    const names = this.resolveNames(topNodes.map(([nodeNum]) => nodeNum));
    const avgRouteLength =
      routeLengths.length > 0 ? routeLengths.reduce((sum, length) => sum + length, 0) / routeLengths.length : 0;

    return {
      time_period_hours: hours,
      total_traceroutes: rows.length,
      successful_traceroutes: successful,
      success_rate: percentage(successful, rows.length),
      traceroutes_with_return: withReturn,
      return_path_rate: percentage(withReturn, successful),
      unique_routes: uniqueRoutes.size,
      avg_route_length: Math.round(avgRouteLength * 10) / 10,
      top_participating_nodes: topNodes.map(([nodeNum, count]) => ({
        node_id: nodeNum,
        node_name: resolveNodeName(names, nodeNum),
        participation_count: count
      }))
    };
  }

  /**
   * Most frequent routes between a pair of endpoints, either direction.
   */
  getRoutePatterns(limit: number = 50): RoutePatterns {
    logger.info(`Getting route patterns (limit=${limit})`);
    const rows = this.fetchPackets({ successOnly: true, limit: ANALYSIS_SAMPLE_LIMIT });

    const patterns = new Map<string, Omit<RoutePattern, 'endpoints_names' | 'route_nodes_names' | 'route_display'>>();
    for (const row of rows) {
      if (!row.rawPayload || row.fromNodeNum === null || row.toNodeNum === null) continue;
      const { record } = decodeRouteDiscoveryWithStrategy(row.rawPayload);
      if (record.routeNodes.length === 0) continue;

      const endpoints: [number, number] = [
        Math.min(row.fromNodeNum, row.toNodeNum),
        Math.max(row.fromNodeNum, row.toNodeNum)
      ];
      const key = `${endpoints.join('-')}:${record.routeNodes.join(',')}`;
      let pattern = patterns.get(key);
      if (!pattern) {
        pattern = { count: 0, endpoints, route_nodes: record.routeNodes, examples: [] };
        patterns.set(key, pattern);
      }

      pattern.count++;
      if (pattern.examples.length < PATTERN_EXAMPLE_LIMIT) {
        pattern.examples.push({
          packet_id: row.id,
          timestamp: row.timestamp,
          from_node: row.fromNodeNum,
          to_node: row.toNodeNum
        });
      }
    }

    const top = [...patterns.values()].sort((a, b) => b.count - a.count).slice(0, limit);
    const names = this.resolveNames(top.flatMap(pattern => [...pattern.endpoints, ...pattern.route_nodes]));

    return {
      patterns: top.map(pattern => {
        const routeNames = pattern.route_nodes.map(nodeNum => resolveNodeName(names, nodeNum));
        return {
          ...pattern,
          endpoints_names: pattern.endpoints.map(nodeNum => resolveNodeName(names, nodeNum)),
          route_nodes_names: routeNames,
          route_display: routeNames.join(' → ')
        };
      }),
      total_patterns: patterns.size,
      analyzed_traceroutes: rows.length
    };
  }

  getNodeTracerouteStats(nodeNum: number): NodeTracerouteStats {
    logger.info(`Getting traceroute stats for node ${formatNodeId(nodeNum)}`);
    const asSource = this.fetchPackets({ fromNodeNum: nodeNum, limit: ANALYSIS_SAMPLE_LIMIT });
    const asDestination = this.fetchPackets({ toNodeNum: nodeNum, limit: ANALYSIS_SAMPLE_LIMIT });
    const recent = this.fetchPackets({ successOnly: true, limit: ANALYSIS_SAMPLE_LIMIT });

    let participationCount = 0;
    for (const row of recent) {
      if (!row.rawPayload) continue;
      const { record } = decodeRouteDiscoveryWithStrategy(row.rawPayload);
      if (record.routeNodes.includes(nodeNum)) participationCount++;
    }

    const names = this.resolveNames([nodeNum]);
    return {
      node_id: nodeNum,
      node_name: resolveNodeName(names, nodeNum),
      as_source: roleStats(asSource),
      as_destination: roleStats(asDestination),
      as_intermediate_hop: { participation_count: participationCount },
      total_involvement: asSource.length + asDestination.length + participationCount
    };
  }

  /**
   * Longest RF links heard in the analysis window.
   *
   * Throws TracerouteAnalysisError when the store fails or when no packet
   * payload in the window could be decoded. Packets that fail on their own
   * are logged and skipped.
   */
  getLongestLinksAnalysis(criteria: Partial<LinkCriteria> = {}, options: LongestLinksOptions = {}): LongestLinksAnalysis {
    const resolved: LinkCriteria = {
      minDistanceKm: criteria.minDistanceKm ?? 1.0,
      minSnr: criteria.minSnr ?? -20.0,
      maxResults: criteria.maxResults ?? 100
    };
    const config = getEnvironmentConfig();
    logger.info(
      `Getting longest links analysis: min_distance=${resolved.minDistanceKm}km, ` +
        `min_snr=${resolved.minSnr}dB, max_results=${resolved.maxResults}`
    );

    const end = nowSeconds();
    const rows = this.fetchPackets({
      startTime: end - config.analysisWindowDays * 86400,
      endTime: end,
      successOnly: true,
      limit: config.maxTraceroutePackets
    });

    // Decode once up front to learn every node the analysis will need
    const records = new Map<number, RouteDiscoveryRecord>();
    const nodeNums = new Set<number>();
    let withPayload = 0;
    for (const row of rows) {
      if (!row.rawPayload || row.rawPayload.length === 0) continue;
      withPayload++;
      const { record, strategy } = decodeRouteDiscoveryWithStrategy(row.rawPayload);
      if (strategy === null) continue;
      records.set(row.id, record);
      packetNodeNums(row, record).forEach(nodeNum => nodeNums.add(nodeNum));
    }

    if (withPayload > 0 && records.size === 0) {
      throw new TracerouteAnalysisError(`None of the ${withPayload} traceroute payloads in the window could be decoded`);
    }

    const nodeNames = this.resolveNames(nodeNums);
    let resolver: LocationResolver;
    if (options.locationResolver) {
      resolver = options.locationResolver;
    } else {
      const store = this.getStore();
      try {
        resolver = PreloadedLocationResolver.preload(
          store,
          nodeNums,
          config.locationHistoryLimit,
          new DatabaseLocationResolver(store)
        );
      } catch (error) {
        throw new TracerouteAnalysisError('Failed to preload location history', { cause: error });
      }
    }

    const aggregator = new LinkAggregator(resolved);
    let analyzed = 0;
    let skipped = 0;

    // Rows arrive newest first
    for (const row of [...rows].reverse()) {
      const record = records.get(row.id);
      if (!record) {
        skipped++;
        continue;
      }

      try {
        const packet = new TraceroutePacket(row, { record, nodeNames });
        packet.calculateHopDistances(resolver);
        aggregator.addPacket(packet);
        analyzed++;
      } catch (error) {
        logger.warn(`Error processing packet ${row.id} for longest links:`, error);
        skipped++;
      }
    }

    const directLinks = aggregator.getDirectLinks();
    const indirectLinks = aggregator.getIndirectLinks();
    logger.info(
      `Longest links: ${analyzed} packets analyzed, ${skipped} skipped, ` +
        `${aggregator.linkCount} links and ${aggregator.pathCount} paths aggregated`
    );

    return {
      summary: {
        total_links: directLinks.length + indirectLinks.length,
        direct_links: directLinks.length,
        longest_direct: directLinks.length > 0 ? `${directLinks[0].distance_km.toFixed(2)} km` : null,
        longest_path: indirectLinks.length > 0 ? `${indirectLinks[0].total_distance_km.toFixed(2)} km` : null
      },
      direct_links: directLinks,
      indirect_links: indirectLinks,
      criteria: {
        min_distance_km: resolved.minDistanceKm,
        min_snr: resolved.minSnr,
        max_results: resolved.maxResults,
        analysis_period_days: config.analysisWindowDays
      },
      cache_stats: {
        packets_analyzed: analyzed,
        packets_skipped: skipped,
        location_lookups_cached: resolver instanceof PreloadedLocationResolver ? resolver.cachedLookups : null
      }
    };
  }

  /**
   * Node/link graph of RF hops heard in the last `hours`.
   */
  getNetworkGraphData(query: NetworkGraphQuery = {}): NetworkGraph {
    const hours = query.hours ?? 24;
    const minSnr = query.minSnr ?? NO_SNR_LIMIT;
    const includeIndirect = query.includeIndirect ?? false;
    const limitPackets = query.limitPackets ?? 5000;
    logger.info(`Building network graph data for ${hours} hours (min_snr=${minSnr}dB)`);

    const end = nowSeconds();
    const rows = this.fetchPackets({
      startTime: end - hours * 3600,
      endTime: end,
      successOnly: true,
      limit: limitPackets
    });

    const records = new Map<number, RouteDiscoveryRecord>();
    const nodeNums = new Set<number>();
    for (const row of rows) {
      if (!row.rawPayload || row.rawPayload.length === 0) continue;
      const { record } = decodeRouteDiscoveryWithStrategy(row.rawPayload);
      records.set(row.id, record);
      packetNodeNums(row, record).forEach(nodeNum => nodeNums.add(nodeNum));
    }
    const nodeNames = this.resolveNames(nodeNums);

    const builder = new NetworkGraphBuilder({ hours, minSnr, includeIndirect });
    for (const row of rows) {
      const record = records.get(row.id);
      if (!record) {
        builder.skipPacket();
        continue;
      }
      try {
        builder.addPacket(new TraceroutePacket(row, { record, nodeNames }));
      } catch (error) {
        logger.warn(`Error processing traceroute packet ${row.id}:`, error);
        builder.skipPacket();
      }
    }

    let locations = new Map<number, NodeLocation>();
    const graphNodes = builder.getNodeNums();
    if (graphNodes.length > 0) {
      try {
        locations = this.getStore().fetchBulkLatestLocations(graphNodes);
        logger.debug(`Found location data for ${locations.size} of ${graphNodes.length} nodes`);
      } catch (error) {
        logger.warn('Error fetching location data for network graph:', error);
      }
    }

    return builder.build(locations);
  }

  /**
   * One traceroute as heard by every gateway that captured it, merged into a
   * single graph. Null when the packet is not a known traceroute.
   */
  getCombinedTracerouteGraph(packetId: number): CombinedTracerouteGraphResult | null {
    const rows = this.getStore().fetchTracerouteReceptions(packetId);
    if (rows.length === 0) {
      return null;
    }

    const records = new Map<number, RouteDiscoveryRecord>();
    const nodeNums = new Set<number>();
    for (const row of rows) {
      const { record, strategy } = decodeRouteDiscoveryWithStrategy(row.rawPayload);
      if (strategy === null) continue;
      records.set(row.id, record);
      packetNodeNums(row, record).forEach(nodeNum => nodeNums.add(nodeNum));
    }
    const hopNames = this.resolveNames(nodeNums);

    const [main] = rows;
    const builder = new CombinedRouteGraphBuilder({ source: main.fromNodeNum, target: main.toNodeNum });
    for (const row of rows) {
      const record = records.get(row.id);
      if (!record) {
        builder.skipReception(row.gatewayId);
        continue;
      }
      try {
        builder.addPacket(new TraceroutePacket(row, { record, nodeNames: hopNames }));
      } catch (error) {
        logger.debug(`Failed to read reception ${row.id} for combined graph:`, error);
        builder.skipReception(row.gatewayId);
      }
    }

    const graph = builder.build(this.resolveNames(builder.getNodeNums()));
    logger.debug(
      `Combined graph for packet ${packetId}: ${graph.stats.receptions} receptions, ` +
        `${graph.nodes.length} nodes, ${graph.edges.length} edges`
    );
    return { packet_id: packetId, ...graph };
  }

  /**
   * Direct RF links of the last `hours` shaped for drawing on a map.
   */
  getTracerouteLinks(hours = 24): TracerouteMapLink[] {
    const windowHours = Math.min(Math.max(hours, 1), MAX_MAP_LINK_HOURS);
    const graph = this.getNetworkGraphData({
      hours: windowHours,
      includeIndirect: false,
      limitPackets: MAP_LINK_PACKET_LIMIT
    });

    const now = nowSeconds();
    return graph.links.map(link => ({
      from_node_id: link.source,
      to_node_id: link.target,
      success_rate: Math.min(100, Math.max(10, link.packet_count * 10)),
      avg_snr: link.avg_snr,
      age_hours: round((now - link.last_seen) / 3600, 2),
      last_seen: link.last_seen,
      last_seen_str: formatUtc(link.last_seen),
      is_bidirectional: true,
      total_hops_seen: link.packet_count,
      last_packet_id: link.last_packet_id
    }));
  }

  /**
   * Nodes whose latest position lies within `maxDistanceKm` of the node's
   * latest position, nearest first. Empty when the node has no position.
   */
  getNodeNeighbors(nodeNum: number, maxDistanceKm = 10): NodeNeighbor[] {
    const locations = this.getStore().fetchBulkLatestLocations();
    const center = locations.get(nodeNum);
    if (!center) {
      logger.debug(`No location for node ${formatNodeId(nodeNum)}, cannot find neighbors`);
      return [];
    }

    const neighbors: NodeNeighbor[] = [];
    for (const other of locations.values()) {
      if (other.nodeNum === nodeNum) continue;
      const distanceKm = calculateDistance(center.latitude, center.longitude, other.latitude, other.longitude);
      if (distanceKm > maxDistanceKm) continue;

      neighbors.push({
        node_id: other.nodeNum,
        display_name: other.displayName,
        distance_km: round(distanceKm, 2),
        distance_meters: Math.round(distanceKm * 1000),
        location: {
          latitude: other.latitude,
          longitude: other.longitude,
          altitude: other.altitude ?? null
        },
        hw_model: other.hwModel ?? null,
        last_updated: other.timestamp
      });
    }

    return neighbors.sort((a, b) => a.distance_km - b.distance_km);
  }

  /** Latest known position of every node, or of the given nodes. */
  getNodeLocations(nodeNums?: number[]): NodeLocationJson[] {
    const locations = this.getStore().fetchBulkLatestLocations(nodeNums);
    return [...locations.values()].sort((a, b) => a.nodeNum - b.nodeNum).map(nodeLocationToJson);
  }

  /** Newest first. */
  getNodeLocationHistory(nodeNum: number, limit: number = getEnvironmentConfig().locationHistoryLimit): LocationFixJson[] {
    return this.getStore().fetchLocationHistory(nodeNum, limit).map(fixToJson);
  }
}

export const tracerouteService = new TracerouteService();
