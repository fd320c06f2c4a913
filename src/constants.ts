import path from 'node:path';

export interface Symbols {
  BRANCH: string;
  LAST_BRANCH: string;
  INDENT: string;
  INDENT_EMPTY: string;
}

export const SYMBOLS: Symbols = {
  BRANCH: '├── ',
  LAST_BRANCH: '└── ',
  INDENT: '│   ',
  INDENT_EMPTY: '    ',
};

export const ICONS = {
  DIRECTORY: '📂',
  FILE: '📄',
  WARNING: '⚠️',
  SUCCESS: '✅',
  FAILURE: '❌',
  PROMPT: '🔹',
};

export const CONFIG_FILE_NAME = 'exclusions.json';

// src/ and dist/ both sit one level below the package root
export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '..', CONFIG_FILE_NAME);

export const PromptMessages = {
  ENTER_DIRECTORY:
    'Enter the directory to scan (or press Enter to use the current directory)',
  INVALID_DIRECTORY: 'Invalid directory. Please enter a valid path.',
};
