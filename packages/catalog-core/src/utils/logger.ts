/**
 * Structured logging
 *
 * One Powertools logger per function; repositories and services receive a
 * child carrying their own `component` key.
 */

import { Logger } from '@aws-lambda-powertools/logger';
import type { LogLevel } from '../config/config';

export type { Logger };

export function createLogger(serviceName: string, logLevel: LogLevel = 'INFO'): Logger {
  return new Logger({ serviceName, logLevel });
}

export function componentLogger(parent: Logger, component: string): Logger {
  return parent.createChild({ persistentLogAttributes: { component } });
}
