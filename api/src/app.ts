import * as OpenApiValidator from 'express-openapi-validator';
import express from 'express';
import cors from 'cors';
import path from 'path';
import { config } from './config';
import db from './db';
import { RosterEngine } from './roster/engine';
import { createAuthRoutes, createUserRoutes } from './users/controller';
import { UserService } from './users/service';
import { createGroupRoutes } from './groups/controller';
import { GroupService } from './groups/service';
import { createRosterRoutes } from './roster/controller';
import { RosterService } from './roster/service';
import { createAdminRoutes } from './admin/controller';
import { AdminService } from './admin/service';
import { requireAuthenticated } from './http';

export interface AppOptions {
  adminToken?: string | undefined;
  logOperations?: boolean;
}

const statusOf = (err: unknown): number =>
  typeof err === 'object' &&
  err !== null &&
  'status' in err &&
  typeof err.status === 'number'
    ? err.status
    : 500;

export const createApp = (
  engine: RosterEngine = db,
  options: AppOptions = {}
): express.Express => {
  const { adminToken = config.adminToken, logOperations = config.logOperations } =
    options;
  const app = express();

  if (logOperations) {
    engine.subscribe(({ operation, args }) => {
      console.log(`Committed ${operation}(${args.join(', ')})`);
    });
  }

  app.use(cors());
  app.use(express.json());
  app.use(
    OpenApiValidator.middleware({
      apiSpec: path.join(__dirname, 'openapi.yml'),
      validateRequests: true,
      validateResponses: true,
    })
  );

  const userService = new UserService(engine);
  app.use('/', createAuthRoutes(userService));
  app.use('/', createAdminRoutes(new AdminService(engine), adminToken));

  app.use(requireAuthenticated);

  app.use('/', createUserRoutes(userService));
  app.use('/', createGroupRoutes(new GroupService(engine)));
  app.use('/', createRosterRoutes(new RosterService(engine)));

  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      const status = statusOf(err);
      if (status >= 500) {
        console.error('Express error handler caught:', err);
      }
      res.status(status).json({
        error: err instanceof Error ? err.name : 'Error',
        message: err instanceof Error ? err.message : 'Internal Server Error',
        timestamp: new Date().toISOString(),
      });
    }
  );

  return app;
};

export default createApp;
