/**
 * Vitest setup file
 * Runs before all tests
 */

// Required by tsyringe
import 'reflect-metadata';

import { afterEach } from 'vitest';
import { resetContainer } from '../src/di/container.js';

afterEach(() => {
  resetContainer();
});
