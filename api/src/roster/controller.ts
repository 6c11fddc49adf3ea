import express from 'express';
import { isOperationFailure } from '../engine/errors';
import {
  param,
  requireSelf,
  sendError,
  sendInternalError,
  sendOperationFailure,
} from '../http';
import { USER_NOT_FOUND } from '../users/service';
import {
  NewRosterItem,
  RosterItemUpdate,
  RosterService,
  ROSTER_ITEM_NOT_FOUND,
} from './service';

export const createRosterRoutes = (
  rosterService: RosterService = new RosterService()
): express.Router => {
  const router = express.Router();

  router.get(
    '/users/:username/roster',
    (req: express.Request, res: express.Response): void => {
      try {
        const username = param(req, 'username');
        console.log(`Fetching roster for ${username}`);

        const result = rosterService.getRoster(username);
        if (result === USER_NOT_FOUND) {
          sendError(res, 404, 'User not found', `User '${username}' not found`);
          return;
        }

        res.json({ items: result });
      } catch (error) {
        console.error('Error fetching roster:', error);
        sendInternalError(res, 'Failed to fetch roster');
      }
    }
  );

  router.get(
    '/users/:username/roster/:contact',
    (req: express.Request, res: express.Response): void => {
      try {
        const username = param(req, 'username');
        const contact = param(req, 'contact');
        console.log(`Fetching roster entry ${username} -> ${contact}`);

        const result = rosterService.getRosterItem(username, contact);
        if (result === USER_NOT_FOUND) {
          sendError(
            res,
            404,
            'User not found',
            `User '${username}' or '${contact}' not found`
          );
          return;
        }

        res.json(result);
      } catch (error) {
        console.error('Error fetching roster entry:', error);
        sendInternalError(res, 'Failed to fetch roster entry');
      }
    }
  );

  router.get(
    '/users/:username/roster-items',
    (req: express.Request, res: express.Response): void => {
      try {
        const username = param(req, 'username');
        const result = rosterService.getItems(username);
        if (result === USER_NOT_FOUND) {
          sendError(res, 404, 'User not found', `User '${username}' not found`);
          return;
        }

        res.json({ items: result });
      } catch (error) {
        console.error('Error fetching roster items:', error);
        sendInternalError(res, 'Failed to fetch roster items');
      }
    }
  );

  router.post(
    '/users/:username/roster-items',
    requireSelf,
    (req: express.Request, res: express.Response): void => {
      try {
        const username = param(req, 'username');
        const request: NewRosterItem = req.body;
        console.log(`Adding roster item for ${username}: ${request.jid}`);

        const result = rosterService.addRosterItem(username, request);
        if (result === USER_NOT_FOUND) {
          sendError(res, 404, 'User not found', `User '${username}' not found`);
          return;
        }
        if (isOperationFailure(result)) {
          sendOperationFailure(res, result);
          return;
        }

        res.status(201).json(result);
      } catch (error) {
        console.error('Error adding roster item:', error);
        sendInternalError(res, 'Failed to add roster item');
      }
    }
  );

  router.patch(
    '/users/:username/roster-items/:id',
    requireSelf,
    (req: express.Request, res: express.Response): void => {
      try {
        const username = param(req, 'username');
        const id = parseInt(param(req, 'id'), 10);
        const update: RosterItemUpdate = req.body;
        console.log(`Updating roster item ${id} of ${username}`);

        const result = rosterService.updateRosterItem(username, id, update);
        if (result === ROSTER_ITEM_NOT_FOUND) {
          sendError(res, 404, 'Roster item not found', `No roster item ${id}`);
          return;
        }
        if (isOperationFailure(result)) {
          sendOperationFailure(res, result);
          return;
        }

        res.json(result);
      } catch (error) {
        console.error('Error updating roster item:', error);
        sendInternalError(res, 'Failed to update roster item');
      }
    }
  );

  router.delete(
    '/users/:username/roster-items/:id',
    requireSelf,
    (req: express.Request, res: express.Response): void => {
      try {
        const username = param(req, 'username');
        const id = parseInt(param(req, 'id'), 10);
        console.log(`Removing roster item ${id} of ${username}`);

        const result = rosterService.removeRosterItem(username, id);
        if (result === ROSTER_ITEM_NOT_FOUND) {
          sendError(res, 404, 'Roster item not found', `No roster item ${id}`);
          return;
        }
        if (isOperationFailure(result)) {
          sendOperationFailure(res, result);
          return;
        }

        res.status(204).send();
      } catch (error) {
        console.error('Error removing roster item:', error);
        sendInternalError(res, 'Failed to remove roster item');
      }
    }
  );

  return router;
};

export default createRosterRoutes;
