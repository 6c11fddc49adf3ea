import express from 'express';
import { COMMITTED, describeFailure } from '../engine/errors';
import { sendError, sendInternalError } from '../http';
import { RosterSnapshot } from './admin';
import { AdminService } from './service';

export const createAdminRoutes = (
  adminService: AdminService = new AdminService(),
  adminToken: string | undefined = undefined
): express.Router => {
  const router = express.Router();

  const requireAdmin = (
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ): void => {
    const token = req.header('x-admin-token');

    if (!adminToken || token !== adminToken) {
      sendError(res, 403, 'Forbidden', 'Admin access required');
      return;
    }

    next();
  };

  router.get(
    '/admin/snapshot',
    requireAdmin,
    (_req: express.Request, res: express.Response): void => {
      try {
        console.log('Exporting roster snapshot');
        res.json(adminService.exportSnapshot());
      } catch (error) {
        console.error('Error exporting snapshot:', error);
        sendInternalError(res, 'Failed to export snapshot');
      }
    }
  );

  router.put(
    '/admin/snapshot',
    requireAdmin,
    (req: express.Request, res: express.Response): void => {
      try {
        const snapshot: RosterSnapshot = req.body;
        console.log(
          `Importing roster snapshot with ${snapshot.users.length} users and ${snapshot.groups.length} groups`
        );

        const result = adminService.importSnapshot(snapshot);
        if (result !== COMMITTED) {
          res.status(422).json({
            error: 'Invalid Snapshot',
            message: describeFailure(result),
            timestamp: new Date().toISOString(),
            details: result,
          });
          return;
        }

        res.json(adminService.checkInvariants());
      } catch (error) {
        console.error('Error importing snapshot:', error);
        sendInternalError(res, 'Failed to import snapshot');
      }
    }
  );

  router.get(
    '/admin/invariants',
    requireAdmin,
    (_req: express.Request, res: express.Response): void => {
      try {
        res.json(adminService.checkInvariants());
      } catch (error) {
        console.error('Error checking invariants:', error);
        sendInternalError(res, 'Failed to check invariants');
      }
    }
  );

  return router;
};

export default createAdminRoutes;
