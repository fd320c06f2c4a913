import fs from 'node:fs';
import prompts from 'prompts';
import { ICONS, PromptMessages } from './constants';

export type DirectoryInput =
  | { ok: true; path: string; usedCurrentDirectory: boolean }
  | { ok: false; message: string };

export function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

/** Empty input means the current directory; anything else must be an existing directory. */
export function resolveDirectoryInput(input: string, cwd: string): DirectoryInput {
  const trimmed = input.trim();
  if (!trimmed) {
    return { ok: true, path: cwd, usedCurrentDirectory: true };
  }
  if (isDirectory(trimmed)) {
    return { ok: true, path: trimmed, usedCurrentDirectory: false };
  }
  return { ok: false, message: PromptMessages.INVALID_DIRECTORY };
}

/**
 * Asks for the directory to scan until a valid one is given.
 * Resolves to undefined when the user cancels the prompt.
 */
export async function promptForDirectory(
  cwd: string = process.cwd()
): Promise<Extract<DirectoryInput, { ok: true }> | undefined> {
  let cancelled = false;

  const response = await prompts(
    {
      type: 'text',
      name: 'directory',
      message: `${ICONS.PROMPT} ${PromptMessages.ENTER_DIRECTORY}`,
      validate: (value: string) => {
        const result = resolveDirectoryInput(value, cwd);
        return result.ok ? true : `${ICONS.FAILURE} ${result.message}`;
      },
    },
    {
      onCancel: () => {
        cancelled = true;
        return false;
      },
    }
  );

  const answer: unknown = response.directory;
  if (cancelled || typeof answer !== 'string') {
    return undefined;
  }

  const result = resolveDirectoryInput(answer, cwd);
  return result.ok ? result : undefined;
}
