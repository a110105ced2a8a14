/**
 * Locations and Nodes API Endpoint Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import express from 'express';
import request from 'supertest';

vi.mock('../../services/tracerouteService.js', () => ({
  tracerouteService: {
    getNodeLocations: vi.fn(),
    getNodeLocationHistory: vi.fn(),
    getNodeTracerouteStats: vi.fn(),
    getTracerouteLinks: vi.fn(),
    getNodeNeighbors: vi.fn()
  }
}));

import locationsRouter from './locations.js';
import nodesRouter from './nodes.js';
import { tracerouteService } from '../../services/tracerouteService.js';

const FIX = {
  latitude: 40.0,
  longitude: -105.0,
  altitude: 1500,
  timestamp: 1699560000,
  precision_bits: null,
  precision_meters: null,
  sats_in_view: null
};

describe('Locations API Routes', () => {
  let app: express.Application;

  beforeEach(() => {
    vi.clearAllMocks();

    app = express();
    app.use(express.json());
    app.use('/api/v1/locations', locationsRouter);
    app.use('/api/v1/nodes', nodesRouter);
  });

  describe('GET /api/v1/locations', () => {
    it('should return all latest locations with a count', async () => {
      vi.mocked(tracerouteService.getNodeLocations).mockReturnValue([
        {
          ...FIX,
          node_id: 10,
          hex_id: '!0000000a',
          display_name: 'Alpha',
          long_name: 'Alpha',
          short_name: 'Alph',
          hw_model: null,
          role: null
        }
      ]);

      const response = await request(app).get('/api/v1/locations').expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.count).toBe(1);
      expect(response.body.data[0].display_name).toBe('Alpha');
      expect(tracerouteService.getNodeLocations).toHaveBeenCalledWith(undefined);
    });

    it('should parse a node id list', async () => {
      vi.mocked(tracerouteService.getNodeLocations).mockReturnValue([]);

      await request(app).get('/api/v1/locations?node_ids=!0000000a,%2011').expect(200);

      expect(tracerouteService.getNodeLocations).toHaveBeenCalledWith([10, 11]);
    });
  });

  describe('GET /api/v1/locations/:nodeNum/history', () => {
    it('should return the history of one node', async () => {
      vi.mocked(tracerouteService.getNodeLocationHistory).mockReturnValue([FIX]);

      const response = await request(app).get('/api/v1/locations/!0000000a/history?limit=5').expect(200);

      expect(response.body).toEqual({ success: true, node_id: 10, count: 1, data: [FIX] });
      expect(tracerouteService.getNodeLocationHistory).toHaveBeenCalledWith(10, 5);
    });

    it('should reject an unknown node format', async () => {
      await request(app).get('/api/v1/locations/node-ten/history').expect(400);
      expect(tracerouteService.getNodeLocationHistory).not.toHaveBeenCalled();
    });
  });

  describe('GET /api/v1/locations/traceroute-links', () => {
    const LINK = {
      from_node_id: 1,
      to_node_id: 10,
      success_rate: 30,
      avg_snr: -4.3,
      age_hours: 2.5,
      last_seen: 1_700_000_000,
      last_seen_str: '2023-11-14 22:13:20 UTC',
      is_bidirectional: true,
      total_hops_seen: 3,
      last_packet_id: 7
    };

    it('should return the links with a count', async () => {
      vi.mocked(tracerouteService.getTracerouteLinks).mockReturnValue([LINK]);

      const response = await request(app).get('/api/v1/locations/traceroute-links?hours=48').expect(200);

      expect(response.body).toEqual({ success: true, count: 1, data: [LINK] });
      expect(tracerouteService.getTracerouteLinks).toHaveBeenCalledWith(48);
    });

    it('should clamp hours to a week', async () => {
      vi.mocked(tracerouteService.getTracerouteLinks).mockReturnValue([]);

      await request(app).get('/api/v1/locations/traceroute-links?hours=1000').expect(200);

      expect(tracerouteService.getTracerouteLinks).toHaveBeenCalledWith(168);
    });

    it('should return 500 when the links fail', async () => {
      vi.mocked(tracerouteService.getTracerouteLinks).mockImplementation(() => {
        throw new Error('database is locked');
      });

      const response = await request(app).get('/api/v1/locations/traceroute-links').expect(500);

      expect(response.body.message).toBe('Failed to retrieve traceroute links');
    });
  });

  describe('GET /api/v1/locations/:nodeNum/neighbors', () => {
    it('should pass the distance and return the neighbors', async () => {
      const neighbor = {
        node_id: 1,
        display_name: 'Relay',
        distance_km: 5,
        distance_meters: 5004,
        location: { latitude: 40.045, longitude: -105.0, altitude: 1500 },
        hw_model: null,
        last_updated: 1_700_000_000
      };
      vi.mocked(tracerouteService.getNodeNeighbors).mockReturnValue([neighbor]);

      const response = await request(app).get('/api/v1/locations/!0000000a/neighbors?max_distance=2.5').expect(200);

      expect(response.body).toEqual({ success: true, node_id: 10, max_distance_km: 2.5, count: 1, data: [neighbor] });
      expect(tracerouteService.getNodeNeighbors).toHaveBeenCalledWith(10, 2.5);
    });

    it('should default to 10 km', async () => {
      vi.mocked(tracerouteService.getNodeNeighbors).mockReturnValue([]);

      await request(app).get('/api/v1/locations/10/neighbors').expect(200);

      expect(tracerouteService.getNodeNeighbors).toHaveBeenCalledWith(10, 10);
    });

    it('should reject a malformed distance', async () => {
      await request(app).get('/api/v1/locations/10/neighbors?max_distance=far').expect(400);
      expect(tracerouteService.getNodeNeighbors).not.toHaveBeenCalled();
    });
  });

  describe('GET /api/v1/nodes/:nodeNum/traceroute-stats', () => {
    it('should return the node stats', async () => {
      vi.mocked(tracerouteService.getNodeTracerouteStats).mockReturnValue({
        node_id: 1,
        node_name: 'Relay',
        as_source: { total: 0, successful: 0, success_rate: 0 },
        as_destination: { total: 1, successful: 1, success_rate: 100 },
        as_intermediate_hop: { participation_count: 2 },
        total_involvement: 3
      });

      const response = await request(app).get('/api/v1/nodes/1/traceroute-stats').expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.total_involvement).toBe(3);
      expect(tracerouteService.getNodeTracerouteStats).toHaveBeenCalledWith(1);
    });

    it('should return 500 when the stats fail', async () => {
      vi.mocked(tracerouteService.getNodeTracerouteStats).mockImplementation(() => {
        throw new Error('database is locked');
      });

      const response = await request(app).get('/api/v1/nodes/1/traceroute-stats').expect(500);

      expect(response.body.message).toBe('Failed to retrieve node traceroute stats');
    });
  });
});
