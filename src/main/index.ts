#!/usr/bin/env node
/**
 * Entry point
 */
import { initialize } from './core';
import { withErrorHandling } from './error';

// Failures are already logged by withErrorHandling
withErrorHandling(initialize)().catch(() => {
  process.exitCode = 1;
});
