// Traceroute and location types shared by the decoder, models and services

export interface RouteDiscoveryRecord {
  routeNodes: number[];
  // dB, one entry per forward hop: source->hop1, ..., hopN->destination
  snrTowards: number[];
  routeBack: number[];
  snrBack: number[];
}

export interface LocationFix {
  latitude: number;
  longitude: number;
  altitude?: number | null;
  timestamp: number;
  precisionBits?: number | null;
  precisionMeters?: number | null;
  satsInView?: number | null;
}

export interface ResolvedLocation extends LocationFix {
  // null when the fix was taken exactly at the requested time
  ageWarning: string | null;
}

export interface NodeLocation extends LocationFix {
  nodeNum: number;
  nodeId: string;
  displayName: string;
  longName?: string | null;
  shortName?: string | null;
  hwModel?: string | null;
  role?: string | null;
}

export type HopDirection = 'forward_rf' | 'return_rf' | 'forward_relay' | 'return_relay';

export interface TracerouteHop {
  hopNumber: number;
  fromNodeNum: number;
  toNodeNum: number;
  fromNodeName: string;
  toNodeName: string;
  snr: number | null;
  direction: HopDirection;
  distanceKm: number | null;
  fromLocationAgeWarning?: string | null;
  toLocationAgeWarning?: string | null;
}

/**
 * One row of packet_history for the traceroute application.
 */
export interface TraceroutePacketRow {
  id: number;
  timestamp: number;
  fromNodeNum: number | null;
  toNodeNum: number | null;
  gatewayId: string | null;
  // Shared by every gateway's copy of the same transmission
  meshPacketId?: number | null;
  hopStart?: number | null;
  hopLimit?: number | null;
  rawPayload: Uint8Array | null;
  processedSuccessfully: boolean;
}

export interface TraceroutePacketQuery {
  startTime?: number;
  endTime?: number;
  successOnly?: boolean;
  fromNodeNum?: number;
  toNodeNum?: number;
  gatewayId?: string;
  limit: number;
  offset?: number;
}

/**
 * Storage collaborator consumed by the traceroute services.
 */
export interface TracerouteStore {
  fetchTraceroutePackets(query: TraceroutePacketQuery): TraceroutePacketRow[];
  countTraceroutePackets(query: Omit<TraceroutePacketQuery, 'limit' | 'offset'>): number;
  fetchTraceroutePacketById(packetId: number): TraceroutePacketRow | null;
  // The packet first, then its other receptions oldest first; empty when unknown
  fetchTracerouteReceptions(packetId: number): TraceroutePacketRow[];
  // Newest first
  fetchLocationHistory(nodeNum: number, limit: number): LocationFix[];
  fetchLocationAtOrBefore(nodeNum: number, timestamp: number): LocationFix | null;
  fetchLocationAfter(nodeNum: number, timestamp: number): LocationFix | null;
  fetchBulkLatestLocations(nodeNums?: number[]): Map<number, NodeLocation>;
  bulkResolveNodeNames(nodeNums: number[]): Map<number, string>;
}

export interface LinkCriteria {
  minDistanceKm: number;
  minSnr: number;
  maxResults: number;
}

export interface DirectLinkResult {
  from_node_id: number;
  to_node_id: number;
  from_node_name: string;
  to_node_name: string;
  distance_km: number;
  max_distance_km: number;
  avg_snr: number;
  best_snr: number;
  traceroute_count: number;
  recent_packets: number[];
  packet_id: number;
  packet_url: string;
  last_seen: number;
}

export interface IndirectLinkResult {
  from_node_id: number;
  to_node_id: number;
  from_node_name: string;
  to_node_name: string;
  total_distance_km: number;
  max_distance_km: number;
  hop_count: number;
  avg_snr: number;
  traceroute_count: number;
  route_preview: string[];
  recent_packets: number[];
  packet_id: number;
  packet_url: string;
  last_seen: number;
}

export interface LongestLinksAnalysis {
  summary: {
    total_links: number;
    direct_links: number;
    longest_direct: string | null;
    longest_path: string | null;
  };
  direct_links: DirectLinkResult[];
  indirect_links: IndirectLinkResult[];
  criteria: {
    min_distance_km: number;
    min_snr: number;
    max_results: number;
    analysis_period_days: number;
  };
  cache_stats: {
    packets_analyzed: number;
    packets_skipped: number;
    location_lookups_cached: number | null;
  };
}

export interface GraphNode {
  id: number;
  name: string;
  packet_count: number;
  connections: number;
  avg_snr: number | null;
  last_seen: number;
  size: number;
  location?: {
    latitude: number;
    longitude: number;
    altitude: number | null;
  };
}

export interface GraphLink {
  source: number;
  target: number;
  type: 'direct';
  avg_snr: number;
  packet_count: number;
  strength: number;
  last_seen: number;
  last_packet_id: number;
}

export interface GraphIndirectConnection {
  source: number;
  target: number;
  type: 'indirect';
  hop_count: number;
  path_count: number;
  avg_snr: number | null;
  strength: number;
  last_seen: number;
  last_packet_id: number;
}

export interface NetworkGraphStats {
  packets_analyzed: number;
  packets_with_rf_hops: number;
  total_rf_hops: number;
  links_found: number;
  links_filtered_by_snr: number;
  links_filtered_due_to_snr_0: number;
}

export interface NetworkGraph {
  nodes: GraphNode[];
  links: GraphLink[];
  indirect_connections: GraphIndirectConnection[];
  stats: NetworkGraphStats;
  filters: {
    hours: number;
    min_snr: number;
    include_indirect: boolean;
  };
}

export interface CombinedGraphNode {
  id: number;
  label: string;
  type: 'gateway' | 'router';
  is_gateway: boolean;
  is_source: boolean;
  is_target: boolean;
}

export interface CombinedGraphEdge {
  // Display names of the two ends, lower node number first
  id: string;
  // Most often heard direction
  from: number;
  to: number;
  value: number;
  label: string;
  title: string;
  is_bidirectional: boolean;
  packet_ids: number[];
  direction_counts: Record<string, number>;
  avg_snr: number | null;
  paths: number[];
}

export interface CombinedGraphPath {
  packet_id: number;
  nodes: number[];
  color: string;
  gateway_id: string | null;
  gateway_node_id: number | null;
  timestamp: number;
  avg_snr: number | null;
  hop_count: number;
}

export interface CombinedTracerouteGraph {
  nodes: CombinedGraphNode[];
  edges: CombinedGraphEdge[];
  paths: CombinedGraphPath[];
  stats: {
    receptions: number;
    receptions_with_rf_hops: number;
    receptions_skipped: number;
  };
}

export interface TraceroutePathSummary {
  packet_id: number;
  from_node_id: number;
  to_node_id: number;
  from_node_name: string;
  to_node_name: string;
  timestamp: number;
  gateway_id: string | null;
  has_return_path: boolean;
  is_complete: boolean;
  forward_hops: number;
  return_hops: number;
  total_rf_hops: number;
  route_nodes: number[];
  route_back: number[];
  snr_towards: number[];
  snr_back: number[];
}
