import express from 'express';
import {
  describeFailure,
  OperationFailure,
  PRECONDITION_VIOLATION,
} from './engine/errors';
import { normalizeUsername } from './users/service';

export const sendError = (
  res: express.Response,
  status: number,
  error: string,
  message: string
): void => {
  res.status(status).json({
    error,
    message,
    timestamp: new Date().toISOString(),
  });
};

// A precondition failure is the caller's conflict; an invariant failure means
// an operation let through something it should have refused.
export const sendOperationFailure = (
  res: express.Response,
  failure: OperationFailure
): void => {
  const conflict = failure.error === PRECONDITION_VIOLATION;
  res.status(conflict ? 409 : 500).json({
    error: conflict ? 'Conflict' : 'Invariant Violation',
    message: describeFailure(failure),
    timestamp: new Date().toISOString(),
    details: failure,
  });
};

export const sendInternalError = (
  res: express.Response,
  message: string
): void => sendError(res, 500, 'Internal Server Error', message);

export const param = (req: express.Request, name: string): string =>
  req.params[name] ?? '';

export const requireAuthenticated: express.RequestHandler = (req, res, next) => {
  const currentUser = req.header('x-user-id');
  if (!currentUser) {
    sendError(res, 401, 'Unauthorized', 'Missing x-user-id header');
  } else {
    next();
  }
};

/** Lets a request through only when `x-user-id` names the `:username` it acts on. */
export const requireSelf: express.RequestHandler = (req, res, next) => {
  const currentUser = normalizeUsername(req.header('x-user-id') ?? '');
  const username = normalizeUsername(param(req, 'username'));
  if (currentUser !== username) {
    sendError(res, 403, 'Forbidden', `Only ${username} may change this resource`);
  } else {
    next();
  }
};
