/**
 * Temporary directories for filesystem tests
 */

import tmp from 'tmp';

export interface TestTempDir {
  path: string;
  cleanup: () => void;
}

export function createTestTempDir(prefix = 'cds-test-'): TestTempDir {
  const dir = tmp.dirSync({ prefix, unsafeCleanup: true });
  return { path: dir.name, cleanup: dir.removeCallback };
}
