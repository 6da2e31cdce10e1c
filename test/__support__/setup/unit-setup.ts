import { afterEach, jest } from '@jest/globals';

// process.test.ts waits on real child processes
jest.setTimeout(15000);

afterEach(() => {
  jest.restoreAllMocks();
});
