import express from 'express';
import { isOperationFailure } from '../engine/errors';
import {
  param,
  requireSelf,
  sendError,
  sendInternalError,
  sendOperationFailure,
} from '../http';
import { UserService, USER_NOT_FOUND } from './service';
import { UserRegistration, UserUpdate } from './users';

export const createAuthRoutes = (
  userService: UserService = new UserService()
): express.Router => {
  const router = express.Router();

  router.post(
    '/users',
    (req: express.Request, res: express.Response): void => {
      try {
        const registration: UserRegistration = req.body;
        console.log('Registering user:', registration.username);

        const result = userService.registerUser(registration);
        if (isOperationFailure(result)) {
          sendOperationFailure(res, result);
          return;
        }

        res.status(201).json(result);
      } catch (error) {
        console.error('Error registering user:', error);
        sendInternalError(res, 'Failed to register user');
      }
    }
  );

  router.post(
    '/auth/login',
    (req: express.Request, res: express.Response): void => {
      try {
        const { username, password } = req.body;
        const result = userService.verifyPassword(username, password);

        if (result !== true) {
          sendError(res, 401, 'Unauthorized', 'Invalid username or password');
          return;
        }

        res.json({ user: userService.getUserByUsername(username) });
      } catch (error) {
        console.error('Error logging in user:', error);
        sendInternalError(res, 'Failed to log in');
      }
    }
  );

  return router;
};

export const createUserRoutes = (
  userService: UserService = new UserService()
): express.Router => {
  const router = express.Router();

  router.get('/users', (_req: express.Request, res: express.Response) => {
    try {
      console.log('Fetching all users');
      const users = userService.getAllUsers();
      res.json({ users });
    } catch (error) {
      console.error('Error fetching users:', error);
      sendInternalError(res, 'Failed to fetch users');
    }
  });

  router.get(
    '/users/:username',
    (req: express.Request, res: express.Response): void => {
      try {
        const username = param(req, 'username');
        console.log('Fetching user by username:', username);

        const result = userService.getUserByUsername(username);
        if (result === USER_NOT_FOUND) {
          sendError(
            res,
            404,
            'User not found',
            `User with username '${username}' not found`
          );
          return;
        }

        res.json(result);
      } catch (error) {
        console.error('Error fetching user by username:', error);
        sendInternalError(res, 'Failed to fetch user');
      }
    }
  );

  router.patch(
    '/users/:username',
    requireSelf,
    (req: express.Request, res: express.Response): void => {
      try {
        const username = param(req, 'username');
        const update: UserUpdate = req.body;
        console.log(`Updating user: ${username}`);

        const result = userService.updateUser(username, update);
        if (result === USER_NOT_FOUND) {
          sendError(res, 404, 'User not found', `User '${username}' not found`);
          return;
        }
        if (isOperationFailure(result)) {
          sendOperationFailure(res, result);
          return;
        }

        res.json(result);
      } catch (error) {
        console.error('Error updating user:', error);
        sendInternalError(res, 'Failed to update user');
      }
    }
  );

  router.delete(
    '/users/:username',
    requireSelf,
    (req: express.Request, res: express.Response): void => {
      try {
        const username = param(req, 'username');
        console.log(`Deleting user: ${username}`);

        const result = userService.deleteUser(username);
        if (result === USER_NOT_FOUND) {
          sendError(res, 404, 'User not found', `User '${username}' not found`);
          return;
        }
        if (isOperationFailure(result)) {
          sendOperationFailure(res, result);
          return;
        }

        res.status(204).send();
      } catch (error) {
        console.error('Error deleting user:', error);
        sendInternalError(res, 'Failed to delete user');
      }
    }
  );

  return router;
};

export default createUserRoutes;
