/**
 * API Routes for the Carpool Service
 *
 * GET    /api/health                 - Health check
 * GET    /api/drives                 - List drives
 * GET    /api/drives/:id             - Get one drive
 * POST   /api/drives                 - Offer drives and match riders to them
 * POST   /api/drives/:id/match       - Re-run matching for open seats
 * PUT    /api/drives/:id/capacity    - Change a drive's seat count
 * DELETE /api/drives/:id             - Delete a drive (admin)
 * GET    /api/riders                 - List riders
 * GET    /api/riders/:id             - Get one rider
 * POST   /api/riders                 - Register or update a rider
 * POST   /api/riders/import          - Import riders from a CSV export
 * DELETE /api/riders/:id             - Delete a rider (admin)
 * POST   /api/signup                 - Rider signs up for a specific drive
 * GET    /api/regions                - Service-area region table
 * GET    /api/config                 - List all configurations
 * GET    /api/config/:configId       - Get a specific configuration
 * PUT    /api/config/:configId       - Update a configuration
 */

import express, { Router, Request, Response } from 'express';
import {
  ApiResponse,
  ConfigUpdateSchema,
  CsvImportSchema
} from '../models/types';
import { ConfigManager, configManager } from '../config/config';
import { ALGORITHM_VERSION } from '../matchers/MatchingEngine';
import { RideService, parsePayload } from '../services/RideService';
import { AppError, NotFoundError } from '../utils/errors';

// =============================================================================
// ERROR MAPPING
// =============================================================================

export interface ErrorReply {
  status: number;
  body: ApiResponse<never>;
}

/**
 * Turn a thrown error into the status and envelope sent to the client.
 * Known errors keep their code; anything else is a 500.
 */
export function toErrorReply(error: unknown, exposeMessage: boolean): ErrorReply {
  if (error instanceof AppError) {
    return {
      status: error.statusCode,
      body: {
        success: false,
        error: { code: error.code, message: error.message, details: error.details }
      }
    };
  }

  return {
    status: 500,
    body: {
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: exposeMessage && error instanceof Error ? error.message : 'Internal server error'
      }
    }
  };
}

// =============================================================================
// ROUTER
// =============================================================================

export interface RideRoutesOptions {
  configs?: ConfigManager;

  /** Include raw error messages in 500 responses (development only) */
  exposeErrors?: boolean;
}

export function createRideRoutes(service: RideService, options: RideRoutesOptions = {}): Router {
  const router = Router();
  const configs = options.configs || configManager;
  const exposeErrors = options.exposeErrors ?? false;

  const fail = (res: Response, error: unknown, context: string) => {
    const reply = toErrorReply(error, exposeErrors);
    if (reply.status >= 500) {
      console.error(`[Routes] ${context} error:`, error);
    }
    return res.status(reply.status).json(reply.body);
  };

  // ===========================================================================
  // HEALTH CHECK ENDPOINT
  // ===========================================================================

  router.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      version: ALGORITHM_VERSION,
      features: ['region-matching', 'weekly-fairness', 'self-signup', 'csv-import'],
      timestamp: new Date().toISOString()
    });
  });

  // ===========================================================================
  // DRIVES
  // ===========================================================================

  router.get('/drives', async (req: Request, res: Response) => {
    try {
      const drives = await service.listDrives();
      return res.json({ success: true, data: drives });
    } catch (error) {
      return fail(res, error, 'List drives');
    }
  });

  router.get('/drives/:id', async (req: Request, res: Response) => {
    try {
      const drive = await service.getDrive(req.params.id);
      if (!drive) {
        throw new NotFoundError('Drive', req.params.id);
      }
      return res.json({ success: true, data: drive });
    } catch (error) {
      return fail(res, error, 'Get drive');
    }
  });

  /**
   * Offer one or more drives. Each slot becomes its own drive and is
   * matched immediately; the response carries every drive and its result.
   */
  router.post('/drives', async (req: Request, res: Response) => {
    try {
      const matches = await service.createDrive(req.body);
      return res.status(201).json({ success: true, data: matches });
    } catch (error) {
      return fail(res, error, 'Create drive');
    }
  });

  router.post('/drives/:id/match', async (req: Request, res: Response) => {
    try {
      const match = await service.matchDrive(req.params.id);
      return res.json({ success: true, data: match });
    } catch (error) {
      return fail(res, error, 'Match drive');
    }
  });

  router.put('/drives/:id/capacity', async (req: Request, res: Response) => {
    try {
      const drive = await service.editCapacity(req.params.id, req.body);
      return res.json({ success: true, data: drive });
    } catch (error) {
      return fail(res, error, 'Edit capacity');
    }
  });

  router.delete('/drives/:id', async (req: Request, res: Response) => {
    try {
      const deleted = await service.deleteDrive(req.params.id);
      if (!deleted) {
        throw new NotFoundError('Drive', req.params.id);
      }
      return res.json({ success: true, data: { id: req.params.id } });
    } catch (error) {
      return fail(res, error, 'Delete drive');
    }
  });

  // ===========================================================================
  // RIDERS
  // ===========================================================================

  router.get('/riders', async (req: Request, res: Response) => {
    try {
      const riders = await service.listRiders();
      return res.json({ success: true, data: riders });
    } catch (error) {
      return fail(res, error, 'List riders');
    }
  });

  router.get('/riders/:id', async (req: Request, res: Response) => {
    try {
      const rider = await service.getRider(req.params.id);
      if (!rider) {
        throw new NotFoundError('Rider', req.params.id);
      }
      return res.json({ success: true, data: rider });
    } catch (error) {
      return fail(res, error, 'Get rider');
    }
  });

  router.post('/riders', async (req: Request, res: Response) => {
    try {
      const outcome = await service.registerRider(req.body);
      return res.status(outcome.created ? 201 : 200).json({ success: true, data: outcome });
    } catch (error) {
      return fail(res, error, 'Register rider');
    }
  });

  /**
   * Accepts either a text/csv body or JSON { csv: "..." }.
   */
  router.post(
    '/riders/import',
    express.text({ type: ['text/csv', 'text/plain'], limit: '5mb' }),
    async (req: Request, res: Response) => {
      try {
        const csvText = parsePayload(CsvImportSchema, req.body);
        const outcome = await service.importRidersFromCsv(csvText);
        return res.json({ success: true, data: outcome });
      } catch (error) {
        return fail(res, error, 'Import riders');
      }
    }
  );

  router.delete('/riders/:id', async (req: Request, res: Response) => {
    try {
      const deleted = await service.deleteRider(req.params.id);
      if (!deleted) {
        throw new NotFoundError('Rider', req.params.id);
      }
      return res.json({ success: true, data: { id: req.params.id } });
    } catch (error) {
      return fail(res, error, 'Delete rider');
    }
  });

  // ===========================================================================
  // SELF-SERVICE SIGNUP
  // ===========================================================================

  router.post('/signup', async (req: Request, res: Response) => {
    try {
      const outcome = await service.signup(req.body);
      return res.json({ success: true, data: outcome });
    } catch (error) {
      return fail(res, error, 'Signup');
    }
  });

  // ===========================================================================
  // REGIONS
  // ===========================================================================

  router.get('/regions', (req: Request, res: Response) => {
    res.json({ success: true, data: service.regions() });
  });

  // ===========================================================================
  // CONFIGURATION ENDPOINTS
  // ===========================================================================

  router.get('/config', (req: Request, res: Response) => {
    res.json({ success: true, data: configs.listConfigs() });
  });

  router.get('/config/:configId', (req: Request, res: Response) => {
    res.json({ success: true, data: configs.getConfig(req.params.configId) });
  });

  /**
   * Update a configuration. Changes to the default config apply to the
   * next match.
   */
  router.put('/config/:configId', (req: Request, res: Response) => {
    try {
      const { configId } = req.params;
      const updates = parsePayload(ConfigUpdateSchema, req.body);

      const updatedConfig = configs.updateConfig(configId, updates);

      return res.json({ success: true, data: updatedConfig });
    } catch (error) {
      if (error instanceof AppError) {
        return fail(res, error, 'Update config');
      }
      return res.status(400).json({
        success: false,
        error: {
          code: 'CONFIG_ERROR',
          message: error instanceof Error ? error.message : 'Unknown error'
        }
      });
    }
  });

  return router;
}
