import chalk from 'chalk';

export const styleKV = (label: string, value: string | number): string =>
  `${chalk.magenta(label)}: ${chalk.white(String(value))}`;

export const styleSize = (width: number, height: number): string => styleKV('Size', `${width}x${height}`);

export const logInfo = (message: string): void => {
  process.stdout.write(`${message}\n`);
};

export const logSuccess = (message: string): void => {
  logInfo(chalk.green(message));
};

export const logWarn = (message: string): void => {
  process.stderr.write(`${chalk.yellow('WARN')} ${message}\n`);
};

export const logError = (message: string): void => {
  process.stderr.write(`${chalk.red('ERROR')} ${message}\n`);
};
