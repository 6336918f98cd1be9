import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getConfigDir, resolveConfigDir } from '../../../src/infra/config/config-paths.js';

function makeTempHome(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'chatrelay-config-paths-'));
}

describe('config-paths', () => {
  test('defaults to ~/.config/chatrelay', () => {
    const tempHome = makeTempHome();

    expect(resolveConfigDir({ HOME: tempHome })).toBe(path.join(tempHome, '.config', 'chatrelay'));
  });

  test('uses XDG_CONFIG_HOME when set', () => {
    const tempHome = makeTempHome();
    const xdg = path.join(tempHome, 'xdg');

    expect(resolveConfigDir({ HOME: tempHome, XDG_CONFIG_HOME: xdg })).toBe(path.join(xdg, 'chatrelay'));
  });

  test('respects explicit config dir override', () => {
    const tempHome = makeTempHome();
    const overrideDir = path.join(tempHome, 'custom-config');

    const configDir = getConfigDir({ HOME: tempHome, CHATRELAY_CONFIG_DIR: overrideDir });

    expect(configDir).toBe(overrideDir);
    expect(fs.existsSync(overrideDir)).toBe(true);
  });

  test('ignores a blank override', () => {
    const tempHome = makeTempHome();

    expect(resolveConfigDir({ HOME: tempHome, CHATRELAY_CONFIG_DIR: '  ' })).toBe(
      path.join(tempHome, '.config', 'chatrelay')
    );
  });
});
