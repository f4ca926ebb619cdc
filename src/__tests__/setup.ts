// Jest setup file for tests

// sharp and the temporary-directory integration tests can be slow on CI runners
jest.setTimeout(15000);
