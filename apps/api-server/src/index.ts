export { createApp, type CreateAppOptions } from './app.js';
export { loadConfig, type AppConfig } from './config.js';
export { createOracleServices, type OracleServices, type OracleServicesOptions } from './oracle-host.js';
export { statusForError } from './middleware/errors.js';
