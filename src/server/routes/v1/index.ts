/**
 * v1 API Router
 *
 * Main router for the versioned v1 REST API
 */

import express from 'express';
import traceroutesRouter from './traceroutes.js';
import nodesRouter from './nodes.js';
import locationsRouter from './locations.js';

const router = express.Router();

// API version info endpoint
router.get('/', (_req, res) => {
  res.json({
    version: 'v1',
    description: 'MeshLinks traceroute and RF link analysis API v1',
    endpoints: {
      traceroutes: '/api/v1/traceroutes',
      longestLinks: '/api/v1/traceroutes/longest-links',
      graph: '/api/v1/traceroutes/graph',
      nodes: '/api/v1/nodes',
      locations: '/api/v1/locations'
    }
  });
});

// Mount resource routers
router.use('/traceroutes', traceroutesRouter);
router.use('/nodes', nodesRouter);
router.use('/locations', locationsRouter);

export default router;
