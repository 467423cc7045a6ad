import { jest } from '@jest/globals';

// node-pty is a native add-on; no test may open a real terminal.
jest.mock('node-pty', () => ({
  spawn: jest.fn(() => {
    throw new Error('node-pty is not available in tests; inject a PtyFactory instead.');
  }),
}));
