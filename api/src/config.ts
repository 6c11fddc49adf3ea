import dotenv from 'dotenv';

dotenv.config();

interface Config {
  port: number;
  nodeEnv: string;
  logOperations: boolean;
  adminToken: string | undefined;
}

export const config: Config = {
  port: Number(process.env['PORT']) || 3000,
  nodeEnv: process.env['NODE_ENV'] || 'development',
  logOperations: process.env['LOG_OPERATIONS'] !== 'false',
  adminToken: process.env['ADMIN_TOKEN'] || undefined,
};
