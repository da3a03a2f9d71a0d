export { appConfig, orderConfig, logConfig } from './app.config';
export { dbConfig } from './database.config';
