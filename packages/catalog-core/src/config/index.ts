export { type CatalogConfig, ConfigError, LOG_LEVELS, type LogLevel, loadConfig } from './config';
