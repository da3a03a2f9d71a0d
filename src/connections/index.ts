// Database
export { pool, connectDatabase } from './db';

// Config - All configurations in one place
export { appConfig, orderConfig, logConfig, dbConfig } from './config';
