import express from 'express';
import { isOperationFailure, OperationFailure } from '../engine/errors';
import {
  param,
  sendError,
  sendInternalError,
  sendOperationFailure,
} from '../http';
import { UserNotFoundError, USER_NOT_FOUND } from '../users/service';
import { CreateGroupRequest, UpdateGroupRequest } from './groups';
import { GroupNotFoundError, GroupService, GROUP_NOT_FOUND } from './service';

const handleResult = <Result>(
  res: express.Response,
  result:
    | Result
    | GroupNotFoundError
    | UserNotFoundError
    | OperationFailure,
  status: number = 200
): void => {
  if (result === GROUP_NOT_FOUND) {
    sendError(res, 404, 'Group not found', 'Group not found');
    return;
  }

  if (result === USER_NOT_FOUND) {
    sendError(res, 404, 'User not found', 'User not found');
    return;
  }

  if (isOperationFailure(result)) {
    sendOperationFailure(res, result);
    return;
  }

  if (result === undefined) {
    res.status(204).send();
    return;
  }

  res.status(status).json(result);
};

export const createGroupRoutes = (
  groupService: GroupService = new GroupService()
): express.Router => {
  const router = express.Router();

  router.get('/groups', (_req: express.Request, res: express.Response) => {
    try {
      console.log('Fetching all groups');
      const groups = groupService.getAllGroups();
      res.json({ groups });
    } catch (error) {
      console.error('Error fetching groups:', error);
      sendInternalError(res, 'Failed to fetch groups');
    }
  });

  router.post(
    '/groups',
    (req: express.Request, res: express.Response): void => {
      try {
        const request: CreateGroupRequest = req.body;
        console.log('Creating new group');
        handleResult(res, groupService.createGroup(request), 201);
      } catch (error) {
        console.error('Error creating group:', error);
        sendInternalError(res, 'Failed to create group');
      }
    }
  );

  router.get(
    '/groups/:name',
    (req: express.Request, res: express.Response): void => {
      try {
        const name = param(req, 'name');
        console.log(`Fetching group: ${name}`);
        handleResult(res, groupService.getGroupByName(name));
      } catch (error) {
        console.error('Error fetching group:', error);
        sendInternalError(res, 'Failed to fetch group');
      }
    }
  );

  router.patch(
    '/groups/:name',
    (req: express.Request, res: express.Response): void => {
      try {
        const name = param(req, 'name');
        const request: UpdateGroupRequest = req.body;
        console.log(`Updating group: ${name}`);
        handleResult(res, groupService.updateGroup(name, request));
      } catch (error) {
        console.error('Error updating group:', error);
        sendInternalError(res, 'Failed to update group');
      }
    }
  );

  router.delete(
    '/groups/:name',
    (req: express.Request, res: express.Response): void => {
      try {
        const name = param(req, 'name');
        console.log(`Deleting group: ${name}`);
        handleResult(res, groupService.deleteGroup(name));
      } catch (error) {
        console.error('Error deleting group:', error);
        sendInternalError(res, 'Failed to delete group');
      }
    }
  );

  router.put(
    '/groups/:name/members/:username',
    (req: express.Request, res: express.Response): void => {
      try {
        const name = param(req, 'name');
        const username = param(req, 'username');
        console.log(`Adding ${username} to group ${name}`);
        handleResult(res, groupService.addMember(name, username));
      } catch (error) {
        console.error('Error adding group member:', error);
        sendInternalError(res, 'Failed to add group member');
      }
    }
  );

  router.delete(
    '/groups/:name/members/:username',
    (req: express.Request, res: express.Response): void => {
      try {
        const name = param(req, 'name');
        const username = param(req, 'username');
        console.log(`Removing ${username} from group ${name}`);
        handleResult(res, groupService.removeMember(name, username));
      } catch (error) {
        console.error('Error removing group member:', error);
        sendInternalError(res, 'Failed to remove group member');
      }
    }
  );

  router.put(
    '/groups/:name/admins/:username',
    (req: express.Request, res: express.Response): void => {
      try {
        const name = param(req, 'name');
        const username = param(req, 'username');
        console.log(`Making ${username} an admin of group ${name}`);
        handleResult(res, groupService.addAdmin(name, username));
      } catch (error) {
        console.error('Error adding group admin:', error);
        sendInternalError(res, 'Failed to add group admin');
      }
    }
  );

  router.delete(
    '/groups/:name/admins/:username',
    (req: express.Request, res: express.Response): void => {
      try {
        const name = param(req, 'name');
        const username = param(req, 'username');
        console.log(`Removing ${username} as admin of group ${name}`);
        handleResult(res, groupService.removeAdmin(name, username));
      } catch (error) {
        console.error('Error removing group admin:', error);
        sendInternalError(res, 'Failed to remove group admin');
      }
    }
  );

  router.put(
    '/groups/:name/children/:child',
    (req: express.Request, res: express.Response): void => {
      try {
        const name = param(req, 'name');
        const child = param(req, 'child');
        console.log(`Sharing group ${child} under ${name}`);
        handleResult(res, groupService.addChildGroup(name, child));
      } catch (error) {
        console.error('Error adding child group:', error);
        sendInternalError(res, 'Failed to add child group');
      }
    }
  );

  router.delete(
    '/groups/:name/children/:child',
    (req: express.Request, res: express.Response): void => {
      try {
        const name = param(req, 'name');
        const child = param(req, 'child');
        console.log(`Unsharing group ${child} from ${name}`);
        handleResult(res, groupService.removeChildGroup(name, child));
      } catch (error) {
        console.error('Error removing child group:', error);
        sendInternalError(res, 'Failed to remove child group');
      }
    }
  );

  router.get(
    '/groups/:name/watchers',
    (req: express.Request, res: express.Response): void => {
      try {
        const name = param(req, 'name');
        console.log(`Fetching users watching group ${name}`);
        const result = groupService.getWatchers(name);
        handleResult(
          res,
          result === GROUP_NOT_FOUND ? result : { usernames: result }
        );
      } catch (error) {
        console.error('Error fetching group watchers:', error);
        sendInternalError(res, 'Failed to fetch group watchers');
      }
    }
  );

  router.get(
    '/groups/:name/visibility/:username',
    (req: express.Request, res: express.Response): void => {
      try {
        const name = param(req, 'name');
        const username = param(req, 'username');
        const result = groupService.isVisibleTo(name, username);
        handleResult(
          res,
          typeof result === 'boolean' ? { visible: result } : result
        );
      } catch (error) {
        console.error('Error checking group visibility:', error);
        sendInternalError(res, 'Failed to check group visibility');
      }
    }
  );

  return router;
};

export default createGroupRoutes;
