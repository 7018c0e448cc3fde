/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

export const ensureParentDirectory = async (filePath: string): Promise<void> => {
  await ensureDirectory(dirname(filePath));
};

export const readJsonFile = async (filePath: string): Promise<unknown> => {
  const buffer = await fs.readFile(filePath, 'utf8');
  const parsed: unknown = JSON.parse(buffer);
  return parsed;
};

export const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};
