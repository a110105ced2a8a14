import { describe, it, expect } from 'vitest';
import { NetworkGraphBuilder, NO_SNR_LIMIT, type NetworkGraphOptions } from './networkGraphBuilder.js';
import { TraceroutePacket } from '../models/traceroutePacket.js';
import type { NodeLocation, RouteDiscoveryRecord } from '../../types/traceroute.js';
import { packetRow } from '../../test/traceroutes.js';

const OPTIONS: NetworkGraphOptions = { hours: 24, minSnr: -10, includeIndirect: true };

function packet(id: number, timestamp: number, record: Partial<RouteDiscoveryRecord>): TraceroutePacket {
  return new TraceroutePacket(packetRow({ id, timestamp, fromNodeNum: 10, toNodeNum: 11 }), {
    record: { routeNodes: [], snrTowards: [], routeBack: [], snrBack: [], ...record }
  });
}

// 10 -> 1 -> 11, second hop below the SNR floor
const WEAK_TAIL = packet(1, 1000, { routeNodes: [1], snrTowards: [5, -15] });
// 10 -> 2 -> 11, first hop relayed
const RELAYED_HEAD = packet(2, 2000, { routeNodes: [2], snrTowards: [0, 8] });

describe('NetworkGraphBuilder', () => {
  it('should build nodes, links and indirect connections from RF hops', () => {
    const builder = new NetworkGraphBuilder(OPTIONS);
    builder.addPacket(WEAK_TAIL);
    builder.addPacket(RELAYED_HEAD);

    const graph = builder.build();

    expect(graph.nodes.map(node => [node.id, node.packet_count, node.connections, node.avg_snr])).toEqual([
      [10, 1, 1, 5],
      [1, 1, 1, null],
      [2, 1, 1, 8],
      [11, 1, 1, null]
    ]);
    expect(graph.nodes[0].size).toBe(5);
    expect(graph.links).toEqual([
      { source: 1, target: 10, type: 'direct', avg_snr: 5, packet_count: 1, strength: 5, last_seen: 1000, last_packet_id: 1 },
      { source: 2, target: 11, type: 'direct', avg_snr: 8, packet_count: 1, strength: 5.6, last_seen: 2000, last_packet_id: 2 }
    ]);
    expect(graph.indirect_connections).toEqual([
      {
        source: 10,
        target: 11,
        type: 'indirect',
        hop_count: 2,
        path_count: 1,
        avg_snr: -5,
        strength: 0.5,
        last_seen: 1000,
        last_packet_id: 1
      }
    ]);
    expect(graph.stats).toEqual({
      packets_analyzed: 2,
      packets_with_rf_hops: 2,
      total_rf_hops: 3,
      links_found: 2,
      links_filtered_by_snr: 1,
      links_filtered_due_to_snr_0: 1
    });
    expect(graph.filters).toEqual({ hours: 24, min_snr: -10, include_indirect: true });
  });

  it('should not filter by SNR at the no-limit floor', () => {
    const builder = new NetworkGraphBuilder({ ...OPTIONS, minSnr: NO_SNR_LIMIT });
    builder.addPacket(WEAK_TAIL);

    const graph = builder.build();
    expect(graph.links).toHaveLength(2);
    expect(graph.stats.links_filtered_by_snr).toBe(0);
  });

  it('should merge repeated links and track the newest packet', () => {
    const builder = new NetworkGraphBuilder(OPTIONS);
    builder.addPacket(packet(5, 5000, { snrTowards: [4] }));
    builder.addPacket(packet(3, 3000, { snrTowards: [-2] }));

    const [link] = builder.build().links;
    expect(link.packet_count).toBe(2);
    expect(link.avg_snr).toBe(1);
    expect(link.last_packet_id).toBe(5);
    expect(link.last_seen).toBe(5000);
  });

  it('should drop indirect connections between directly linked nodes', () => {
    const builder = new NetworkGraphBuilder(OPTIONS);
    builder.addPacket(WEAK_TAIL);
    builder.addPacket(packet(3, 3000, { snrTowards: [3] }));

    expect(builder.build().indirect_connections).toEqual([]);
  });

  it('should leave out indirect connections unless asked', () => {
    const builder = new NetworkGraphBuilder({ ...OPTIONS, includeIndirect: false });
    builder.addPacket(WEAK_TAIL);

    expect(builder.build().indirect_connections).toEqual([]);
  });

  it('should count skipped packets as analyzed', () => {
    const builder = new NetworkGraphBuilder(OPTIONS);
    builder.skipPacket();
    builder.addPacket(packet(4, 4000, { routeNodes: [1], snrTowards: [0] }));

    const graph = builder.build();
    expect(graph.nodes).toEqual([]);
    expect(graph.stats.packets_analyzed).toBe(2);
    expect(graph.stats.packets_with_rf_hops).toBe(0);
    expect(graph.stats.links_filtered_due_to_snr_0).toBe(1);
  });

  it('should attach known locations to nodes', () => {
    const builder = new NetworkGraphBuilder(OPTIONS);
    builder.addPacket(WEAK_TAIL);
    const location: NodeLocation = {
      nodeNum: 10,
      nodeId: '!0000000a',
      displayName: 'Alpha',
      latitude: 40.0,
      longitude: -105.0,
      timestamp: 900
    };

    const graph = builder.build(new Map([[10, location]]));

    expect(builder.getNodeNums()).toEqual([10, 1]);
    expect(graph.nodes[0].location).toEqual({ latitude: 40.0, longitude: -105.0, altitude: null });
    expect(graph.nodes[1].location).toBeUndefined();
  });
});
