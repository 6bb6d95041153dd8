import { beforeEach } from 'vitest';

import { configureLogger } from '../utils/logger.js';

beforeEach(() => {
  configureLogger({ level: 'quiet' });
});
