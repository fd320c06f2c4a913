import fs from 'node:fs';
import { z } from 'zod';
import type { Logger } from './logger';
import { consoleLogger } from './logger';

export interface ExclusionConfig {
  readonly excludedDirectoryNames: ReadonlySet<string>;
  readonly excludedFileNames: ReadonlySet<string>;
}

// Keys are the ones users already write in exclusions.json
export const exclusionFileSchema = z.object({
  exclude_dirs: z.array(z.string()).optional(),
  exclude_files: z.array(z.string()).optional(),
});

export function createExclusionConfig(
  directoryNames: Iterable<string> = [],
  fileNames: Iterable<string> = []
): ExclusionConfig {
  return Object.freeze({
    excludedDirectoryNames: new Set(directoryNames),
    excludedFileNames: new Set(fileNames),
  });
}

export const EMPTY_EXCLUSIONS: ExclusionConfig = createExclusionConfig();

/**
 * Loads the directory and file names to skip from a JSON file.
 *
 * A missing, unreadable or malformed file never fails the run: a warning is
 * logged and both sets come back empty.
 */
export function loadExclusions(
  configPath: string,
  logger: Logger = consoleLogger
): ExclusionConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch {
    return warnAndFallBack(configPath, logger);
  }

  const parsed = exclusionFileSchema.safeParse(raw);
  if (!parsed.success) {
    return warnAndFallBack(configPath, logger);
  }

  return createExclusionConfig(
    parsed.data.exclude_dirs ?? [],
    parsed.data.exclude_files ?? []
  );
}

function warnAndFallBack(configPath: string, logger: Logger): ExclusionConfig {
  logger.warn(`'${configPath}' not found or has an invalid format.`);
  return EMPTY_EXCLUSIONS;
}
