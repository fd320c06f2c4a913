import chalk from 'chalk';
import { ICONS } from './constants';

export interface Logger {
  success(message: string, ...optionalParams: unknown[]): void;
  warn(message: string, ...optionalParams: unknown[]): void;
  error(message: string, ...optionalParams: unknown[]): void;
}

export class ConsoleLogger implements Logger {
  success(message: string, ...optionalParams: unknown[]): void {
    console.log(chalk.green(`${ICONS.SUCCESS} ${message}`), ...optionalParams);
  }

  warn(message: string, ...optionalParams: unknown[]): void {
    console.error(
      chalk.yellow(`${ICONS.WARNING} Warning: ${message}`),
      ...optionalParams
    );
  }

  error(message: string, ...optionalParams: unknown[]): void {
    console.error(chalk.red(`${ICONS.FAILURE} ${message}`), ...optionalParams);
  }
}

export const consoleLogger = new ConsoleLogger();
