#!/usr/bin/env node
import axios from 'axios';
import cac from 'cac';
import { spawn } from 'child_process';
import * as fs from 'fs/promises';
import * as net from 'net';
import * as path from 'path';
import { CliPresenter } from './adapters/presenters/CliPresenter';
import { HighlightResult } from './domain/entities';
import { loadConfig } from './infrastructure/config';
import { getDaemonFilePath } from './utils/daemon';

type DaemonInfo = { port: number; pid: number };

const cli = cac('ts-highlight');
const presenter = new CliPresenter();
const config = loadConfig();
const daemonFilePath = getDaemonFilePath(config.rootPath);

function isDaemonInfo(value: unknown): value is DaemonInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'port' in value &&
    typeof value.port === 'number' &&
    'pid' in value &&
    typeof value.pid === 'number'
  );
}

async function getDaemonInfo(): Promise<DaemonInfo | null> {
  try {
    const content: unknown = JSON.parse(await fs.readFile(daemonFilePath, 'utf-8'));
    return isDaemonInfo(content) ? content : null;
  } catch {
    return null;
  }
}

async function isServerRunning(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new net.Socket();
    socket.setTimeout(500);
    socket.on('connect', () => {
      socket.destroy();
      resolve(true);
    });
    socket.on('timeout', () => {
      socket.destroy();
      resolve(false);
    });
    socket.on('error', () => {
      resolve(false);
    });
    socket.connect(port, config.host);
  });
}

async function waitForServer(retries = 20, delay = 1000): Promise<number> {
  for (let i = 0; i < retries; i++) {
    const info = await getDaemonInfo();
    if (info) {
      try {
        await axios.get(`http://${config.host}:${info.port}/health`);
        return info.port;
      } catch {
        // still starting
      }
    }
    await new Promise((r) => setTimeout(r, delay));
  }
  throw new Error('Server failed to start within timeout');
}

async function ensureServerRunning(): Promise<number> {
  const info = await getDaemonInfo();
  if (info) {
    if (await isServerRunning(info.port)) {
      return info.port;
    }
    // Stale file from a daemon that died.
    await fs.rm(daemonFilePath, { force: true });
  }

  console.error('Server not running. Starting server...');

  const isTs = __filename.endsWith('.ts');
  const scriptPath = isTs
    ? path.join(__dirname, 'main.ts')
    : path.join(__dirname, 'main.js');

  const command = isTs ? 'npx' : 'node';
  const args = isTs ? ['ts-node', scriptPath] : [scriptPath];

  const child = spawn(command, args, {
    detached: true,
    stdio: 'ignore',
    cwd: process.cwd(),
  });

  child.unref();

  // Type-checking a large project up front can take minutes.
  const port = await waitForServer(300);
  console.error(`Server started on port ${port}.`);
  return port;
}

function handleError(error: unknown) {
  if (axios.isAxiosError(error) && error.response) {
    console.error(`Error: ${error.response.status} - ${JSON.stringify(error.response.data)}`);
  } else if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('Unknown error occurred');
  }
  process.exit(1);
}

const withServer =
  <A extends unknown[]>(action: (baseUrl: string, ...args: A) => Promise<void>) =>
    async (...args: A) => {
      try {
        const port = await ensureServerRunning();
        const baseUrl = `http://${config.host}:${port}`;
        await action(baseUrl, ...args);
      } catch (error) {
        handleError(error);
      }
    };

function toArray(value: string | string[] | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return Array.isArray(value) ? value : [value];
}

cli
  .command('highlight <id>', 'Highlight the symbol at an ID (file:line:character)')
  .option('--scope <file>', 'Document to search, repeatable (default: the file of the ID)')
  .option('--table', 'Output in table format')
  .action(
    withServer(async (baseUrl: string, id: string, options: { scope?: string | string[]; table?: boolean }) => {
      const response = await axios.get<HighlightResult>(`${baseUrl}/highlights`, {
        params: { id, scope: toArray(options.scope) },
        paramsSerializer: { indexes: null },
      });
      presenter.present(response.data, options);
    }),
  );

cli
  .command('sync <file>', 'Send the current contents of a file to the server')
  .action(
    withServer(async (baseUrl: string, file: string) => {
      const filePath = path.resolve(file);
      const text = await fs.readFile(filePath, 'utf-8');
      const response = await axios.put(`${baseUrl}/documents`, { path: filePath, text });
      presenter.present(response.data, {});
    }),
  );

cli.command('stop', 'Stop the background server').action(async () => {
  try {
    const info = await getDaemonInfo();
    if (!info) {
      console.log('Server is not running (no daemon file).');
      return;
    }
    await axios.post(`http://${config.host}:${info.port}/shutdown`, {});
    console.log('Server stopping...');
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.log('Server is not running or failed to stop.', msg);
  }
});

cli.help();
cli.version('0.1.0');

cli.parse();
