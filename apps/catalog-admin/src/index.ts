#!/usr/bin/env tsx
/**
 * Catalog admin CLI - Entry Point
 */

import { createCli } from './cli';
import { error } from './utils/output';

const program = createCli();

program.parseAsync(process.argv).catch((err: unknown) => {
  error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
