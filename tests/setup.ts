import os from 'os';
import path from 'path';
import fs from 'fs';
import { afterAll } from 'vitest';

process.env.LOG_CONSOLE = '0';
process.env.LOG_FILE = '';
process.env.LOG_LEVEL = 'error';

// Keep commits reproducible regardless of the machine's git configuration.
process.env.GIT_AUTHOR_NAME = 'bridge-test';
process.env.GIT_AUTHOR_EMAIL = 'bridge-test@example.com';
process.env.GIT_COMMITTER_NAME = 'bridge-test';
process.env.GIT_COMMITTER_EMAIL = 'bridge-test@example.com';
process.env.GIT_CONFIG_GLOBAL = os.devNull;
process.env.GIT_CONFIG_NOSYSTEM = '1';

const tmpBase = fs.mkdtempSync(path.join(os.tmpdir(), 'gfb-tests-'));
process.env.GFB_TEST_BASE = tmpBase;

afterAll(() => {
  fs.rmSync(tmpBase, { recursive: true, force: true });
});
