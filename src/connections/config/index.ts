export { appConfig, logConfig, parseFlag } from './app.config';
export { dbConfig } from './database.config';
export type { DatabaseConfig } from './database.config';
