/**
 * v1 API - Traceroutes Endpoint
 *
 * Traceroute listing, per-packet details and RF link analysis
 */

import express, { Request, Response } from 'express';
import { tracerouteService } from '../../services/tracerouteService.js';
import {
  QueryParamError,
  parseBooleanParam,
  parseNodeParam,
  parseNumberParam,
  parseStringParam,
  sendRouteError
} from '../../utils/queryParams.js';

const router = express.Router();

function parsePacketId(value: string): number {
  const packetId = Number(value);
  if (!Number.isInteger(packetId) || packetId < 1) {
    throw new QueryParamError('Packet id must be a positive integer');
  }
  return packetId;
}

function sendPacketNotFound(res: Response, packetId: number): void {
  res.status(404).json({
    success: false,
    error: 'Not Found',
    message: `Traceroute packet ${packetId} not found`
  });
}

/**
 * GET /api/v1/traceroutes
 * Paginated traceroutes, newest first
 *
 * Query parameters:
 * - page: number (default: 1)
 * - per_page: number (default: 50, max: 500)
 * - gateway_id: string
 * - from_node, to_node: node number or !hex id
 */
router.get('/', (req: Request, res: Response) => {
  try {
    const result = tracerouteService.getTraceroutes({
      page: parseNumberParam(req.query, 'page', { defaultValue: 1, min: 1, integer: true }),
      perPage: parseNumberParam(req.query, 'per_page', { defaultValue: 50, min: 1, max: 500, integer: true }),
      gatewayId: parseStringParam(req.query, 'gateway_id'),
      fromNode: parseNodeParam(req.query, 'from_node'),
      toNode: parseNodeParam(req.query, 'to_node')
    });
    res.json({ success: true, ...result });
  } catch (error) {
    sendRouteError(res, error, 'Failed to retrieve traceroutes');
  }
});

/**
 * GET /api/v1/traceroutes/analysis
 * Success and return-path rates over the last `hours` (default: 24, max: 8760)
 */
router.get('/analysis', (req: Request, res: Response) => {
  try {
    const hours = parseNumberParam(req.query, 'hours', { defaultValue: 24, min: 1, max: 8760, integer: true });
    res.json({ success: true, ...tracerouteService.getTracerouteAnalysis(hours) });
  } catch (error) {
    sendRouteError(res, error, 'Failed to analyze traceroutes');
  }
});

/**
 * GET /api/v1/traceroutes/patterns
 * Most common routes (limit default: 50, max: 500)
 */
router.get('/patterns', (req: Request, res: Response) => {
  try {
    const limit = parseNumberParam(req.query, 'limit', { defaultValue: 50, min: 1, max: 500, integer: true });
    res.json({ success: true, ...tracerouteService.getRoutePatterns(limit) });
  } catch (error) {
    sendRouteError(res, error, 'Failed to retrieve route patterns');
  }
});

/**
 * GET /api/v1/traceroutes/longest-links
 *
 * Query parameters:
 * - min_distance: km (default: 1)
 * - min_snr: dB (default: -20)
 * - max_results: number (default: 100, max: 1000)
 */
router.get('/longest-links', (req: Request, res: Response) => {
  try {
    const analysis = tracerouteService.getLongestLinksAnalysis({
      minDistanceKm: parseNumberParam(req.query, 'min_distance', { defaultValue: 1, min: 0 }),
      minSnr: parseNumberParam(req.query, 'min_snr', { defaultValue: -20 }),
      maxResults: parseNumberParam(req.query, 'max_results', { defaultValue: 100, min: 1, max: 1000, integer: true })
    });
    res.json({ success: true, ...analysis });
  } catch (error) {
    sendRouteError(res, error, 'Failed to analyze longest links');
  }
});

/**
 * GET /api/v1/traceroutes/graph
 *
 * Query parameters:
 * - hours: number (default: 24, max: 720)
 * - min_snr: dB (default: -200, no limit)
 * - include_indirect: boolean (default: false)
 * - limit_packets: number (default: 5000, max: 50000)
 */
router.get('/graph', (req: Request, res: Response) => {
  try {
    const graph = tracerouteService.getNetworkGraphData({
      hours: parseNumberParam(req.query, 'hours', { defaultValue: 24, min: 1, max: 720, integer: true }),
      minSnr: parseNumberParam(req.query, 'min_snr', { defaultValue: -200 }),
      includeIndirect: parseBooleanParam(req.query, 'include_indirect', false),
      limitPackets: parseNumberParam(req.query, 'limit_packets', { defaultValue: 5000, min: 1, max: 50000, integer: true })
    });
    res.json({ success: true, ...graph });
  } catch (error) {
    sendRouteError(res, error, 'Failed to build network graph');
  }
});

/**
 * GET /api/v1/traceroutes/:id/graph
 * RF paths of every gateway's reception of the packet, merged into one graph
 */
router.get('/:id/graph', (req: Request, res: Response) => {
  try {
    const packetId = parsePacketId(req.params.id);
    const graph = tracerouteService.getCombinedTracerouteGraph(packetId);
    if (!graph) {
      sendPacketNotFound(res, packetId);
      return;
    }

    res.json({ success: true, ...graph });
  } catch (error) {
    sendRouteError(res, error, 'Failed to build traceroute graph');
  }
});

/**
 * GET /api/v1/traceroutes/:id
 * One traceroute packet with hop distances
 */
router.get('/:id', (req: Request, res: Response) => {
  try {
    const packetId = parsePacketId(req.params.id);
    const details = tracerouteService.getTracerouteDetails(packetId);
    if (!details) {
      sendPacketNotFound(res, packetId);
      return;
    }

    res.json({ success: true, ...details });
  } catch (error) {
    sendRouteError(res, error, 'Failed to retrieve traceroute');
  }
});

export default router;
