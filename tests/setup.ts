/**
 * Vitest setup file
 * Runs before all tests
 */

// Required for tsyringe DI decorators
import 'reflect-metadata';

import { afterEach } from 'vitest';
import { resetContainer } from '../src/di/container.js';

afterEach(() => {
  resetContainer();
});

// NOTE: Do not register process-level signal handlers in tests.
// Vitest owns the process lifecycle; signals are driven through fake ProcessSignals.
