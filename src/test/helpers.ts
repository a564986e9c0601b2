import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs/promises';
import { Readable } from 'stream';
import AdmZip from 'adm-zip';
import { Response } from 'node-fetch';
import type { RequestInit } from 'node-fetch';
import type { Game } from '../models/game';
import type { FetchFunction } from '../services/http';

/**
 * Game record with placeholder values
 */
export const makeGame = (overrides: Partial<Game> = {}): Game => ({
  name: 'galaxy',
  title: 'Galaxy Quest',
  description: '',
  version: '1.0',
  languages: ['en'],
  repositoryName: 'main',
  descriptionUrl: '',
  downloadUrl: 'https://games.test/galaxy.zip',
  sizeBytes: 1000,
  publishedAt: new Date('2020-01-01T00:00:00Z'),
  imageUrl: '',
  installed: false,
  ...overrides
});

export type FakeRoute =
  | { status: number; body?: string }
  | { chunks: Buffer[]; failAfter?: boolean }
  | { error: Error }
  | { buffer: Buffer };

/**
 * In-process stand-in for HTTP: maps URLs to canned responses
 */
export const createFakeFetch = (routes: Record<string, FakeRoute>) => {
  const calls: { url: string; init?: RequestInit }[] = [];

  const fetch: FetchFunction = async (url, init) => {
    calls.push({ url, init });
    const route = routes[url];
    if (!route) {
      return new Response('not found', { status: 404, statusText: 'Not Found' });
    }
    if ('error' in route) {
      throw route.error;
    }
    if ('buffer' in route) {
      return new Response(Readable.from([route.buffer]), { status: 200 });
    }
    if ('chunks' in route) {
      const { chunks, failAfter } = route;
      const stream = Readable.from(
        (async function* () {
          for (const chunk of chunks) {
            yield chunk;
          }
          if (failAfter) {
            throw new Error('socket hang up');
          }
        })()
      );
      return new Response(stream, { status: 200 });
    }
    return new Response(route.body ?? '', { status: route.status, statusText: `Status ${route.status}` });
  };

  return { fetch, calls };
};

export const jsonRoute = (document: unknown): FakeRoute => ({ status: 200, body: JSON.stringify(document) });

/**
 * Zip archive with the given text files
 */
export const buildArchive = (files: Record<string, string>): Buffer => {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content, 'utf-8'));
  }
  return zip.toBuffer();
};

export const splitIntoChunks = (buffer: Buffer, size: number): Buffer[] => {
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < buffer.length; offset += size) {
    chunks.push(buffer.subarray(offset, offset + size));
  }
  return chunks;
};

export const createTempDir = (prefix = 'questshelf-test-'): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeDir = (dir: string): Promise<void> => fs.rm(dir, { recursive: true, force: true });

export const pathExists = async (target: string): Promise<boolean> => {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
};

/**
 * Executable shell script used as a stand-in interpreter
 */
export const writeScript = async (file: string, body: string): Promise<string> => {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return file;
};

/**
 * Polls until `target` exists, for processes the code under test does not wait for
 */
export const waitForFile = async (target: string, timeoutMs = 3000): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (await pathExists(target)) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 25));
  }
  throw new Error(`${target} did not appear within ${timeoutMs} ms`);
};
