import { beforeEach, afterEach, vi } from 'vitest';
import { setLogLevel } from '@cancelfill/shared-core';

// Mock Firebase admin bootstrap; tests run against the in-memory store
vi.mock('@cancelfill/shared-firebase', () => ({
  getAdminApp: vi.fn(),
  getAdminFirestore: vi.fn(() => {
    throw new Error('Firestore is not available in tests');
  }),
}));

// Keep test output readable
setLogLevel('error');

// Reset all mocks before each test
beforeEach(() => {
  vi.clearAllMocks();
});

// Cleanup after each test
afterEach(() => {
  vi.restoreAllMocks();
});
