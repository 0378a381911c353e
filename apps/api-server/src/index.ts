export { createApp } from './app';
export { loadServerConfig, serverEnvSchema } from './config/server-config';
export type { ServerConfig } from './config/server-config';
export { createContainer } from './container';
export type { Container } from './container';
export { HttpError } from './middleware/error-handler';
export type { AppDeps } from './types';
