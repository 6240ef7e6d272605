import * as path from 'path';

export interface DaemonConfig {
  /** Project whose documents are loaded. */
  rootPath: string;
  /** First port tried when looking for a free one. */
  basePort: number;
  host: string;
}

export const DEFAULT_BASE_PORT = 30000;
export const DEFAULT_HOST = '127.0.0.1';

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): DaemonConfig {
  const rootPath = path.resolve(cwd, env.TS_HIGHLIGHT_ROOT ?? '.');
  return {
    rootPath,
    basePort: parsePort(env.TS_HIGHLIGHT_PORT),
    host: DEFAULT_HOST,
  };
}

function parsePort(value: string | undefined): number {
  if (value === undefined || value === '') {
    return DEFAULT_BASE_PORT;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid TS_HIGHLIGHT_PORT: ${value}`);
  }
  return port;
}
