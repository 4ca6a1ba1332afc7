import fs from 'node:fs';
import path from 'node:path';

import { WindowConfigSchema, type WindowConfig } from '@termshell/shared';

export function loadWindowConfig(configPath: string): WindowConfig {
  const resolvedPath = path.resolve(configPath);

  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, 'utf8');
  } catch (err) {
    const anyErr = err as NodeJS.ErrnoException;
    if (anyErr && anyErr.code === 'ENOENT') {
      throw new Error(`Window configuration file not found at ${resolvedPath}`);
    }

    throw new Error(`Failed to read window configuration file at ${resolvedPath}: ${anyErr}`);
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw) as unknown;
  } catch (err) {
    throw new Error(
      `Window configuration file at ${resolvedPath} is not valid JSON: ${(err as Error).message}`,
    );
  }

  const result = WindowConfigSchema.safeParse(parsedJson);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid window configuration at ${resolvedPath}: ${details}`);
  }
  return result.data;
}
