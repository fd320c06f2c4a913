import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH } from './constants';
import type { DirectoryInput } from './directoryPrompt';
import { promptForDirectory, resolveDirectoryInput } from './directoryPrompt';
import { DirectoryTree } from './directoryTree';
import { loadExclusions } from './exclusionConfig';
import type { Logger } from './logger';
import { consoleLogger } from './logger';
import { printTree } from './treeRenderer';

export interface CliOptions {
  config: string;
}

type ValidDirectory = Extract<DirectoryInput, { ok: true }>;

export interface RunDependencies {
  logger: Logger;
  cwd: string;
  prompt: (cwd: string) => Promise<ValidDirectory | undefined>;
  write: (line: string) => void;
}

function defaultDependencies(): RunDependencies {
  return {
    logger: consoleLogger,
    cwd: process.cwd(),
    prompt: promptForDirectory,
    write: (line) => console.log(line),
  };
}

async function chooseDirectory(
  directoryArg: string | undefined,
  deps: RunDependencies
): Promise<ValidDirectory | undefined> {
  if (directoryArg !== undefined) {
    const result = resolveDirectoryInput(directoryArg, deps.cwd);
    if (result.ok) return result;
    deps.logger.error(`${result.message} (${directoryArg})`);
  }
  return deps.prompt(deps.cwd);
}

/**
 * Loads exclusions, picks the root directory and prints its tree.
 * Returns the process exit code.
 */
export async function run(
  directoryArg: string | undefined,
  options: CliOptions,
  overrides: Partial<RunDependencies> = {}
): Promise<number> {
  const deps: RunDependencies = { ...defaultDependencies(), ...overrides };

  const exclusions = loadExclusions(options.config, deps.logger);

  const directory = await chooseDirectory(directoryArg, deps);
  if (!directory) {
    return 1;
  }
  if (directory.usedCurrentDirectory) {
    deps.logger.success(`Using current directory: ${directory.path}`);
  }

  const tree = new DirectoryTree(exclusions).build(directory.path);
  printTree(tree, deps.write);
  return 0;
}

export function createProgram(
  onRun: (directory: string | undefined, options: CliOptions) => Promise<void>
): Command {
  const program = new Command();

  program
    .name('project-tree')
    .description('Recursively list project directories while respecting exclusions.')
    .version('1.0.0')
    .argument('[directory]', 'directory to scan (prompted for when omitted)')
    .option('-c, --config <path>', 'path to the exclusions.json file', DEFAULT_CONFIG_PATH)
    .action(async (directory: string | undefined, options: CliOptions) => {
      await onRun(directory, options);
    });

  return program;
}
