// =====================================================
// Hooks Controller
// =====================================================
// HTTP layer for record-management callbacks. Business logic
// lives in RecordHooksService.
// All endpoints require a service token.

import { Router, Request, Response, NextFunction } from 'express';
import type { ApiResponse } from '@yahrzeit-reminders/shared-types';
import { parseRequest, requireServiceToken, validateRequest } from '../../middleware';
import type { ServiceTokenOptions } from '../../middleware';
import type { RecordHooksService } from '../../services/records/record-hooks.service';
import {
  changeDeathDateSchema,
  convertDateQuerySchema,
  createSubjectSchema,
  deactivateRecipientSchema,
  recordIdParamSchema,
  upsertRecipientSchema,
} from './hooks.schemas';
import type {
  ChangeDeathDateBody,
  CreateSubjectBody,
  DeactivateRecipientBody,
  UpsertRecipientBody,
} from './hooks.schemas';

type Handler = (req: Request, res: Response) => Promise<void> | void;

// ===========================================
// Helper Functions
// ===========================================

function send<T>(req: Request, res: Response, status: number, data: T): void {
  const response: ApiResponse<T> = {
    success: true,
    data,
    meta: {
      timestamp: new Date().toISOString(),
      requestId: req.id,
    },
  };
  res.status(status).json(response);
}

function handle(handler: Handler) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await handler(req, res);
    } catch (error) {
      next(error);
    }
  };
}

export function createHooksRouter(hooks: RecordHooksService, auth: ServiceTokenOptions): Router {
  const router: Router = Router();
  const byId = validateRequest(recordIdParamSchema, 'params');

  router.use(requireServiceToken(auth));

  // ===========================================
  // POST /hooks/subjects
  // ===========================================
  // A memorial record was created

  router.post(
    '/subjects',
    validateRequest(createSubjectSchema),
    handle(async (req, res) => {
      const body: CreateSubjectBody = req.body;
      const subject = await hooks.onSubjectCreated(body);
      send(req, res, 201, { subject });
    })
  );

  // ===========================================
  // PUT /hooks/subjects/:id/death-date
  // ===========================================

  router.put(
    '/subjects/:id/death-date',
    byId,
    validateRequest(changeDeathDateSchema),
    handle(async (req, res) => {
      const body: ChangeDeathDateBody = req.body;
      const subject = await hooks.onSubjectDeathDateChanged(req.params.id, body.deathDateSolar);
      send(req, res, 200, { subject });
    })
  );

  // ===========================================
  // DELETE /hooks/subjects/:id
  // ===========================================

  router.delete(
    '/subjects/:id',
    byId,
    handle((req, res) => {
      send(req, res, 200, hooks.onSubjectDeleted(req.params.id));
    })
  );

  // ===========================================
  // GET /hooks/subjects/:id/ledger
  // ===========================================
  // Audit view: the subject, its recipients and every ledger entry

  router.get(
    '/subjects/:id/ledger',
    byId,
    handle((req, res) => {
      send(req, res, 200, hooks.getSubjectLedger(req.params.id));
    })
  );

  // ===========================================
  // PUT /hooks/recipients/:id
  // ===========================================

  router.put(
    '/recipients/:id',
    byId,
    validateRequest(upsertRecipientSchema),
    handle((req, res) => {
      const body: UpsertRecipientBody = req.body;
      const recipient = hooks.upsertRecipient({ ...body, id: req.params.id });
      send(req, res, 200, { recipient });
    })
  );

  // ===========================================
  // POST /hooks/recipients/:id/deactivate
  // ===========================================

  router.post(
    '/recipients/:id/deactivate',
    byId,
    validateRequest(deactivateRecipientSchema),
    handle((req, res) => {
      const body: DeactivateRecipientBody = req.body;
      send(req, res, 200, hooks.onRecipientDeactivated(req.params.id, body.reason));
    })
  );

  // ===========================================
  // POST /hooks/recipients/:id/opt-out
  // ===========================================

  router.post(
    '/recipients/:id/opt-out',
    byId,
    handle((req, res) => {
      send(req, res, 200, hooks.onRecipientOptedOut(req.params.id));
    })
  );

  // ===========================================
  // GET /hooks/calendar/convert?date=YYYY-MM-DD
  // ===========================================
  // Used by the page editor to show the lunisolar date

  router.get(
    '/calendar/convert',
    handle(async (req, res) => {
      const { date } = parseRequest(convertDateQuerySchema, req.query);
      send(req, res, 200, await hooks.convertDate(date));
    })
  );

  return router;
}
