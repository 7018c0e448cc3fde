/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createReadStream, promises as fs } from 'node:fs';
import { join } from 'node:path';
import type { Readable } from 'node:stream';
import { createGunzip } from 'node:zlib';

export const isCompressedSource = (filePath: string): boolean => filePath.endsWith('.gz');

const isMissingDirectory = (error: unknown): boolean =>
  error instanceof Error &&
  'code' in error &&
  (error.code === 'ENOENT' || error.code === 'ENOTDIR');

/**
 * Lists regular files in `logDir` whose name starts with `prefix`, newest
 * rotation first (reverse lexical order). A missing directory yields no files.
 */
export async function listLogSources(logDir: string, prefix: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(logDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.startsWith(prefix))
      .map((entry) => join(logDir, entry.name))
      .sort()
      .reverse();
  } catch (error) {
    if (isMissingDirectory(error)) {
      return [];
    }
    throw error;
  }
}

/**
 * Streams the non-empty lines of a log file, gunzipping `.gz` files.
 * Bytes that are not valid UTF-8 decode to U+FFFD. Open, read and
 * decompression failures reject the iteration.
 */
export async function* readLogSourceLines(filePath: string): AsyncGenerator<string> {
  const file = createReadStream(filePath);
  let input: Readable = file;
  if (isCompressedSource(filePath)) {
    const gunzip = createGunzip();
    file.once('error', (error) => gunzip.destroy(error));
    input = file.pipe(gunzip);
  }

  const decoder = new TextDecoder('utf-8');
  let pending = '';
  try {
    for await (const chunk of input) {
      if (typeof chunk === 'string') {
        pending += chunk;
      } else if (chunk instanceof Uint8Array) {
        pending += decoder.decode(chunk, { stream: true });
      }
      const lines = pending.split('\n');
      pending = lines.pop() ?? '';
      for (const rawLine of lines) {
        const line = rawLine.trimEnd();
        if (line.length > 0) {
          yield line;
        }
      }
    }
    const tail = (pending + decoder.decode()).trimEnd();
    if (tail.length > 0) {
      yield tail;
    }
  } finally {
    input.destroy();
    file.destroy();
  }
}
