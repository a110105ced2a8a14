/**
 * v1 API - Nodes Endpoint
 */

import express, { Request, Response } from 'express';
import { tracerouteService } from '../../services/tracerouteService.js';
import { requireNodeNum, sendRouteError } from '../../utils/queryParams.js';

const router = express.Router();

/**
 * GET /api/v1/nodes/:nodeNum/traceroute-stats
 * Traceroute involvement of one node as source, destination and relay
 */
router.get('/:nodeNum/traceroute-stats', (req: Request, res: Response) => {
  try {
    const nodeNum = requireNodeNum(req.params.nodeNum, 'nodeNum');
    res.json({ success: true, ...tracerouteService.getNodeTracerouteStats(nodeNum) });
  } catch (error) {
    sendRouteError(res, error, 'Failed to retrieve node traceroute stats');
  }
});

export default router;
