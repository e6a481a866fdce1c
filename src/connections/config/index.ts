export { appConfig, authConfig } from './app.config';
export { dbConfig } from './database.config';
export { logConfig } from './logging.config';
