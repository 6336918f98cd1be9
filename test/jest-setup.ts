import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

process.env.CHATRELAY_CONFIG_DIR = mkdtempSync(join(tmpdir(), 'chatrelay-jest-'));
delete process.env.CHATRELAY_DEBUG;
delete process.env.DEBUG_MODE;
