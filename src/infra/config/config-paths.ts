import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

function resolveHomeDir(env: NodeJS.ProcessEnv): string {
  const homeFromEnv = env.HOME;
  if (typeof homeFromEnv === 'string' && homeFromEnv.trim()) {
    return homeFromEnv;
  }
  return os.homedir();
}

/**
 * Resolve the configuration directory.
 * CHATRELAY_CONFIG_DIR wins, then $XDG_CONFIG_HOME/chatrelay, then ~/.config/chatrelay.
 */
export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.CHATRELAY_CONFIG_DIR;
  if (typeof override === 'string' && override.trim()) {
    return override;
  }

  const xdgConfigHome = env.XDG_CONFIG_HOME;
  const baseDir =
    typeof xdgConfigHome === 'string' && xdgConfigHome.trim()
      ? xdgConfigHome
      : path.join(resolveHomeDir(env), '.config');
  return path.join(baseDir, 'chatrelay');
}

/**
 * Same as resolveConfigDir, but creates the directory (owner-only) when missing.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const configDir = resolveConfigDir(env);
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }
  return configDir;
}
