/**
 * v1 API - Locations Endpoint
 *
 * Node positions decoded from captured POSITION_APP packets
 */

import express, { Request, Response } from 'express';
import { getEnvironmentConfig } from '../../config/environment.js';
import { tracerouteService } from '../../services/tracerouteService.js';
import { parseNodeListParam, parseNumberParam, requireNodeNum, sendRouteError } from '../../utils/queryParams.js';

const router = express.Router();

/**
 * GET /api/v1/locations
 * Latest position per node
 *
 * Query parameters:
 * - node_ids: comma separated node numbers or !hex ids (default: all nodes)
 */
router.get('/', (req: Request, res: Response) => {
  try {
    const locations = tracerouteService.getNodeLocations(parseNodeListParam(req.query, 'node_ids'));
    res.json({ success: true, count: locations.length, data: locations });
  } catch (error) {
    sendRouteError(res, error, 'Failed to retrieve node locations');
  }
});

/**
 * GET /api/v1/locations/traceroute-links
 * Direct RF links heard in the last `hours` (default: 24, max: 168) for the map
 */
router.get('/traceroute-links', (req: Request, res: Response) => {
  try {
    const hours = parseNumberParam(req.query, 'hours', { defaultValue: 24, min: 1, max: 168 });
    const links = tracerouteService.getTracerouteLinks(hours);
    res.json({ success: true, count: links.length, data: links });
  } catch (error) {
    sendRouteError(res, error, 'Failed to retrieve traceroute links');
  }
});

/**
 * GET /api/v1/locations/:nodeNum/neighbors
 * Nodes within `max_distance` km (default: 10, max: 1000), nearest first
 */
router.get('/:nodeNum/neighbors', (req: Request, res: Response) => {
  try {
    const nodeNum = requireNodeNum(req.params.nodeNum, 'nodeNum');
    const maxDistanceKm = parseNumberParam(req.query, 'max_distance', { defaultValue: 10, min: 0, max: 1000 });

    const neighbors = tracerouteService.getNodeNeighbors(nodeNum, maxDistanceKm);
    res.json({ success: true, node_id: nodeNum, max_distance_km: maxDistanceKm, count: neighbors.length, data: neighbors });
  } catch (error) {
    sendRouteError(res, error, 'Failed to retrieve node neighbors');
  }
});

/**
 * GET /api/v1/locations/:nodeNum/history
 * Recent positions of one node, newest first (limit max: 1000)
 */
router.get('/:nodeNum/history', (req: Request, res: Response) => {
  try {
    const nodeNum = requireNodeNum(req.params.nodeNum, 'nodeNum');
    const limit = parseNumberParam(req.query, 'limit', {
      defaultValue: getEnvironmentConfig().locationHistoryLimit,
      min: 1,
      max: 1000,
      integer: true
    });

    const history = tracerouteService.getNodeLocationHistory(nodeNum, limit);
    res.json({ success: true, node_id: nodeNum, count: history.length, data: history });
  } catch (error) {
    sendRouteError(res, error, 'Failed to retrieve location history');
  }
});

export default router;
