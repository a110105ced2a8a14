import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import { TracerouteAnalysisError, TracerouteService } from './tracerouteService.js';
import { loadProtobufDefinitions } from '../protobufLoader.js';
import { DatabaseService, TRACEROUTE_PORTNUM_NAME } from '../../services/database.js';
import { packetRow, routePayload, seedNode, seedPosition, seedTraceroute, stubStore } from '../../test/traceroutes.js';

const ALPHA = 0x0a;
const RELAY = 0x01;
const BRAVO = 0x0b;

// Start of the clock hour two hours ago, so both packets share a lookup bucket
const BASE = Math.floor(Date.now() / 1000 / 3600) * 3600 - 7200;

describe('TracerouteService', () => {
  let db: DatabaseService;
  let service: TracerouteService;
  let outbound: number;
  let roundTrip: number;

  beforeAll(async () => {
    await loadProtobufDefinitions();
  });

  beforeEach(() => {
    db = new DatabaseService(':memory:');
    service = new TracerouteService(() => db);

    seedNode(db, ALPHA, 'Alpha');
    seedNode(db, RELAY, 'Relay');
    seedNode(db, BRAVO, 'Bravo');
    // 0.045 degrees apart along a meridian, about 5.004 km per hop
    seedPosition(db, ALPHA, BASE - 3600, 40.0, -105.0);
    seedPosition(db, RELAY, BASE - 3600, 40.045, -105.0);
    seedPosition(db, BRAVO, BASE - 3600, 40.09, -105.0);

    outbound = seedTraceroute(db, { from: ALPHA, to: BRAVO, timestamp: BASE + 60, route: [RELAY], snrTowards: [-5, -6] });
    roundTrip = seedTraceroute(db, {
      from: ALPHA,
      to: BRAVO,
      timestamp: BASE + 120,
      route: [RELAY],
      snrTowards: [-5, -6],
      routeBack: [RELAY],
      snrBack: [-4, -3]
    });
  });

  afterEach(() => {
    db.close();
  });

  describe('getTraceroutes', () => {
    it('should page through traceroutes newest first', () => {
      const result = service.getTraceroutes({ page: 1, perPage: 1 });

      expect(result.total_count).toBe(2);
      expect(result.total_pages).toBe(2);
      expect(result.per_page).toBe(1);
      expect(result.traceroutes).toHaveLength(1);

      const [item] = result.traceroutes;
      expect(item.packet_id).toBe(roundTrip);
      expect(item.from_node_name).toBe('Alpha');
      expect(item.display_path).toBe('Alpha → Relay → Bravo');
      expect(item.completion_status).toBe('Forward complete, Return complete');
      expect(item.total_hops).toBe(2);
      expect(item.rf_hops).toBe(4);
      expect(item.hop_start).toBe(3);
      expect(item.hop_limit).toBe(1);
    });

    it('should return the second page', () => {
      const result = service.getTraceroutes({ page: 2, perPage: 1 });

      expect(result.page).toBe(2);
      expect(result.traceroutes[0].packet_id).toBe(outbound);
      expect(result.traceroutes[0].completion_status).toBe('Complete');
    });

    it('should filter by gateway', () => {
      expect(service.getTraceroutes({ gatewayId: '!00000099' }).total_count).toBe(0);
    });
  });

  describe('getTracerouteDetails', () => {
    it('should return hops with distances at packet time', () => {
      const details = service.getTracerouteDetails(outbound);

      expect(details?.display_path).toBe('Alpha → Relay → Bravo');
      expect(details?.return_path).toBe('No path data');
      expect(details?.rf_path).toBe('Alpha → Relay → Bravo');
      expect(details?.id_path).toBe('!0000000a → !00000001 → !0000000b');
      expect(details?.gateway_node_id).toBe(0xabcd);
      expect(details?.is_return_complete).toBe(false);
      expect(details?.forward_hops).toHaveLength(2);
      expect(details?.return_hops).toEqual([]);

      const first = details?.forward_hops[0];
      expect(first?.snr).toBe(-5);
      expect(first?.direction).toBe('forward_rf');
      expect(first?.distance_km).toBeCloseTo(5.004, 2);
      expect(first?.distance_display).toBe('5.00 km');
      // fix is 3660 seconds older than the packet
      expect(first?.from_location_age_warning).toBe('from 1.0h ago');
    });

    it('should return null for unknown packets', () => {
      expect(service.getTracerouteDetails(9999)).toBeNull();
    });
  });

  describe('getLongestLinksAnalysis', () => {
    it('should aggregate both directions of each link', () => {
      const analysis = service.getLongestLinksAnalysis();

      expect(analysis.direct_links).toHaveLength(2);
      const alphaRelay = analysis.direct_links.find(link => link.to_node_id === RELAY);
      expect(alphaRelay).toMatchObject({
        from_node_id: ALPHA,
        to_node_id: RELAY,
        from_node_name: 'Alpha',
        to_node_name: 'Relay',
        distance_km: 5,
        avg_snr: -4.3,
        best_snr: -3,
        traceroute_count: 3,
        recent_packets: [roundTrip, roundTrip, outbound],
        packet_id: roundTrip,
        packet_url: `/packet/${roundTrip}`,
        last_seen: BASE + 120
      });

      expect(analysis.summary).toEqual({
        total_links: 4,
        direct_links: 2,
        longest_direct: '5.00 km',
        longest_path: '10.01 km'
      });
      expect(analysis.criteria).toEqual({
        min_distance_km: 1,
        min_snr: -20,
        max_results: 100,
        analysis_period_days: 7
      });
      expect(analysis.cache_stats).toEqual({
        packets_analyzed: 2,
        packets_skipped: 0,
        location_lookups_cached: 3
      });
    });

    it('should report multi-hop paths per direction', () => {
      const analysis = service.getLongestLinksAnalysis();

      const paths = [...analysis.indirect_links].sort((a, b) => a.from_node_id - b.from_node_id);
      expect(paths.map(link => [link.from_node_id, link.to_node_id, link.traceroute_count])).toEqual([
        [ALPHA, BRAVO, 2],
        [BRAVO, ALPHA, 1]
      ]);
      expect(paths[0].route_preview).toEqual(['Alpha', 'Relay', 'Bravo']);
      expect(paths[1].route_preview).toEqual(['Bravo', 'Relay', 'Alpha']);
      expect(paths[0].total_distance_km).toBe(10.01);
    });

    it('should return no direct links when all are shorter than the minimum', () => {
      const analysis = service.getLongestLinksAnalysis({ minDistanceKm: 10 });

      expect(analysis.direct_links).toEqual([]);
      expect(analysis.summary.longest_direct).toBeNull();
      expect(analysis.summary.longest_path).toBe('10.01 km');
    });

    it('should count packets without a payload as skipped', () => {
      seedTraceroute(db, { from: ALPHA, to: BRAVO, timestamp: BASE + 180, payload: null });

      expect(service.getLongestLinksAnalysis().cache_stats.packets_skipped).toBe(1);
    });

    it('should skip a decodable packet without a source node and keep the rest', () => {
      db.insertPacket({
        timestamp: BASE + 90,
        from_node_id: null,
        to_node_id: BRAVO,
        portnum: 70,
        portnum_name: TRACEROUTE_PORTNUM_NAME,
        raw_payload: routePayload({ route: [RELAY], snrTowards: [-5, -6] })
      });

      const analysis = service.getLongestLinksAnalysis();

      expect(analysis.cache_stats.packets_analyzed).toBe(2);
      expect(analysis.cache_stats.packets_skipped).toBe(1);
      expect(analysis.direct_links).toHaveLength(2);
      expect(analysis.direct_links.find(link => link.to_node_id === RELAY)?.traceroute_count).toBe(3);
    });

    it('should skip a packet whose location lookup throws', () => {
      const lookup = vi.fn((nodeNum: number, timestamp: number) => {
        if (timestamp === BASE + 60) {
          throw new Error(`lookup failed for ${nodeNum}`);
        }
        return null;
      });

      const analysis = service.getLongestLinksAnalysis({}, { locationResolver: { lookup } });

      expect(analysis.cache_stats.packets_analyzed).toBe(1);
      expect(analysis.cache_stats.packets_skipped).toBe(1);
    });

    it('should use an injected location resolver', () => {
      const lookup = vi.fn(() => null);

      const analysis = service.getLongestLinksAnalysis({}, { locationResolver: { lookup } });

      expect(lookup).toHaveBeenCalled();
      expect(analysis.direct_links).toEqual([]);
      expect(analysis.cache_stats.location_lookups_cached).toBeNull();
    });

    it('should fail when no payload in the window can be decoded', () => {
      const broken = new DatabaseService(':memory:');
      seedTraceroute(broken, {
        from: ALPHA,
        to: BRAVO,
        timestamp: BASE,
        payload: new TextEncoder().encode('{"unrelated":1}')
      });

      expect(() => new TracerouteService(() => broken).getLongestLinksAnalysis()).toThrow(
        new TracerouteAnalysisError('None of the 1 traceroute payloads in the window could be decoded')
      );
      broken.close();
    });

    it('should fail when the store cannot be read', () => {
      const store = stubStore({
        fetchTraceroutePackets: vi.fn(() => {
          throw new Error('database is locked');
        })
      });

      expect(() => new TracerouteService(() => store).getLongestLinksAnalysis()).toThrow(TracerouteAnalysisError);
    });
  });

  describe('getNetworkGraphData', () => {
    it('should build the graph with locations and indirect connections', () => {
      const graph = service.getNetworkGraphData({ includeIndirect: true });

      expect(graph.nodes.map(node => node.id).sort((a, b) => a - b)).toEqual([RELAY, ALPHA, BRAVO]);
      expect(graph.nodes.every(node => node.location !== undefined)).toBe(true);
      expect(graph.links).toHaveLength(2);
      expect(graph.indirect_connections).toEqual([
        expect.objectContaining({ source: ALPHA, target: BRAVO, hop_count: 2, path_count: 3, strength: 1.5 })
      ]);
      expect(graph.stats.packets_analyzed).toBe(2);
      expect(graph.stats.total_rf_hops).toBe(6);
      expect(graph.filters).toEqual({ hours: 24, min_snr: -200, include_indirect: true });
    });

    it('should still build the graph when locations cannot be read', () => {
      const store = stubStore({
        fetchTraceroutePackets: vi.fn(() => [
          packetRow({ rawPayload: routePayload({ snrTowards: [4] }) })
        ]),
        fetchBulkLatestLocations: vi.fn(() => {
          throw new Error('disk I/O error');
        })
      });

      const graph = new TracerouteService(() => store).getNetworkGraphData();

      expect(graph.links).toHaveLength(1);
      expect(graph.nodes[0].location).toBeUndefined();
    });
  });

  describe('getCombinedTracerouteGraph', () => {
    it('should merge every reception of a traceroute', () => {
      const main = seedTraceroute(db, {
        from: ALPHA,
        to: BRAVO,
        timestamp: BASE + 300,
        meshPacketId: 500,
        gatewayId: '!0000000b',
        route: [RELAY],
        snrTowards: [-5, -6]
      });
      const second = seedTraceroute(db, {
        from: ALPHA,
        to: BRAVO,
        timestamp: BASE + 301,
        meshPacketId: 500,
        gatewayId: '!000000cc',
        route: [RELAY],
        snrTowards: [-4, -6]
      });
      seedTraceroute(db, { from: ALPHA, to: BRAVO, timestamp: BASE + 302, meshPacketId: 500, gatewayId: '!000000dd', payload: null });

      const graph = service.getCombinedTracerouteGraph(main);

      expect(graph?.packet_id).toBe(main);
      expect(graph?.stats).toEqual({ receptions: 3, receptions_with_rf_hops: 2, receptions_skipped: 1 });
      expect(graph?.nodes).toEqual([
        { id: ALPHA, label: 'Alpha', type: 'router', is_gateway: false, is_source: true, is_target: false },
        { id: RELAY, label: 'Relay', type: 'router', is_gateway: false, is_source: false, is_target: false },
        { id: BRAVO, label: 'Bravo', type: 'gateway', is_gateway: true, is_source: false, is_target: true },
        { id: 0xcc, label: '!000000cc', type: 'gateway', is_gateway: true, is_source: false, is_target: false },
        { id: 0xdd, label: '!000000dd', type: 'gateway', is_gateway: true, is_source: false, is_target: false }
      ]);
      expect(graph?.edges[0]).toEqual({
        id: 'Relay-Alpha',
        from: ALPHA,
        to: RELAY,
        value: 2,
        label: '2x',
        title: 'Observations: 2 | Avg SNR: -4.5 dB | Relay ↔ Alpha',
        is_bidirectional: false,
        packet_ids: [main, second],
        direction_counts: { '10-1': 2 },
        avg_snr: -4.5,
        paths: [main, second]
      });
      expect(graph?.edges[1].title).toBe('Observations: 2 | Avg SNR: -6.0 dB | Relay ↔ Bravo');
      expect(graph?.paths).toEqual([
        {
          packet_id: main,
          nodes: [ALPHA, RELAY, BRAVO],
          color: 'hsl(0, 80%, 60%)',
          gateway_id: '!0000000b',
          gateway_node_id: BRAVO,
          timestamp: BASE + 300,
          avg_snr: -5.5,
          hop_count: 2
        },
        {
          packet_id: second,
          nodes: [ALPHA, RELAY, BRAVO],
          color: 'hsl(137, 80%, 60%)',
          gateway_id: '!000000cc',
          gateway_node_id: 0xcc,
          timestamp: BASE + 301,
          avg_snr: -5,
          hop_count: 2
        }
      ]);
    });

    it('should build a graph from a single reception', () => {
      const graph = service.getCombinedTracerouteGraph(roundTrip);

      expect(graph?.stats.receptions).toBe(1);
      expect(graph?.paths[0].nodes).toEqual([ALPHA, RELAY, BRAVO, RELAY, ALPHA]);
      expect(graph?.edges.map(edge => edge.is_bidirectional)).toEqual([true, true]);
    });

    it('should return null for unknown packets', () => {
      expect(service.getCombinedTracerouteGraph(9999)).toBeNull();
    });
  });

  describe('getTracerouteLinks', () => {
    it('should shape direct links for the map', () => {
      const links = [...service.getTracerouteLinks()].sort((a, b) => a.to_node_id - b.to_node_id);

      expect(links).toHaveLength(2);
      expect(links[0]).toMatchObject({
        from_node_id: RELAY,
        to_node_id: ALPHA,
        success_rate: 30,
        avg_snr: -4.3,
        last_seen: BASE + 120,
        is_bidirectional: true,
        total_hops_seen: 3,
        last_packet_id: roundTrip
      });
      expect(links[0].last_seen_str).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:02:00 UTC$/);
      expect(links[0].age_hours).toBeGreaterThan(1.9);
      expect(links[0].age_hours).toBeLessThan(3);
      expect(links[1]).toMatchObject({ to_node_id: BRAVO, avg_snr: -5.3 });
    });

    it('should clamp the window and read only direct links', () => {
      const graphSpy = vi.spyOn(service, 'getNetworkGraphData');

      service.getTracerouteLinks(1000);
      service.getTracerouteLinks(0);

      expect(graphSpy).toHaveBeenNthCalledWith(1, { hours: 168, includeIndirect: false, limitPackets: 2000 });
      expect(graphSpy).toHaveBeenNthCalledWith(2, { hours: 1, includeIndirect: false, limitPackets: 2000 });
    });
  });

  describe('getNodeNeighbors', () => {
    it('should list nodes within the distance nearest first', () => {
      expect(service.getNodeNeighbors(ALPHA).map(neighbor => neighbor.node_id)).toEqual([RELAY]);

      const neighbors = service.getNodeNeighbors(ALPHA, 20);
      expect(neighbors).toEqual([
        {
          node_id: RELAY,
          display_name: 'Relay',
          distance_km: 5,
          distance_meters: 5004,
          location: { latitude: 40.045, longitude: -105.0, altitude: 1500 },
          hw_model: null,
          last_updated: BASE - 3600
        },
        expect.objectContaining({ node_id: BRAVO, distance_km: 10.01, distance_meters: 10008 })
      ]);
    });

    it('should return nothing for a node without a position', () => {
      expect(service.getNodeNeighbors(0x99)).toEqual([]);
    });
  });

  describe('summary statistics', () => {
    it('should summarize recent traceroutes', () => {
      const analysis = service.getTracerouteAnalysis(24);

      expect(analysis).toEqual({
        time_period_hours: 24,
        total_traceroutes: 2,
        successful_traceroutes: 2,
        success_rate: 100,
        traceroutes_with_return: 1,
        return_path_rate: 50,
        unique_routes: 1,
        avg_route_length: 1,
        top_participating_nodes: [
          { node_id: ALPHA, node_name: 'Alpha', participation_count: 2 },
          { node_id: RELAY, node_name: 'Relay', participation_count: 2 },
          { node_id: BRAVO, node_name: 'Bravo', participation_count: 2 }
        ]
      });
    });

    it('should group identical routes into patterns', () => {
      const result = service.getRoutePatterns();

      expect(result.total_patterns).toBe(1);
      expect(result.analyzed_traceroutes).toBe(2);
      expect(result.patterns[0]).toMatchObject({
        count: 2,
        endpoints: [ALPHA, BRAVO],
        route_nodes: [RELAY],
        endpoints_names: ['Alpha', 'Bravo'],
        route_display: 'Relay'
      });
      expect(result.patterns[0].examples.map(example => example.packet_id)).toEqual([roundTrip, outbound]);
    });

    it('should report node involvement by role', () => {
      seedTraceroute(db, { from: ALPHA, to: RELAY, timestamp: BASE + 240, processedSuccessfully: false });

      const alpha = service.getNodeTracerouteStats(ALPHA);
      expect(alpha.as_source).toEqual({ total: 3, successful: 2, success_rate: 66.7 });
      expect(alpha.as_destination.total).toBe(0);

      const relay = service.getNodeTracerouteStats(RELAY);
      expect(relay.node_name).toBe('Relay');
      expect(relay.as_destination).toEqual({ total: 1, successful: 0, success_rate: 0 });
      expect(relay.as_intermediate_hop.participation_count).toBe(2);
      expect(relay.total_involvement).toBe(3);
    });
  });

  describe('locations', () => {
    it('should list latest locations ordered by node', () => {
      const locations = service.getNodeLocations();

      expect(locations.map(location => location.node_id)).toEqual([RELAY, ALPHA, BRAVO]);
      expect(locations[1]).toMatchObject({
        node_id: ALPHA,
        hex_id: '!0000000a',
        display_name: 'Alpha',
        long_name: 'Alpha',
        latitude: 40.0,
        longitude: -105.0,
        altitude: 1500,
        timestamp: BASE - 3600
      });
      expect(service.getNodeLocations([BRAVO]).map(location => location.node_id)).toEqual([BRAVO]);
    });

    it('should return location history newest first', () => {
      seedPosition(db, ALPHA, BASE, 40.001, -105.0);

      const history = service.getNodeLocationHistory(ALPHA, 10);

      expect(history.map(fix => fix.timestamp)).toEqual([BASE, BASE - 3600]);
      expect(history[0].precision_bits).toBeNull();
    });
  });
});
