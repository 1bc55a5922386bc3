import chalk from 'chalk';
import { listFormats } from '@pixarray/core';

/** One `id: description` line per format, as shown in `convert --help`. */
export function describeFormats(): string {
  return listFormats()
    .map((format) => `  ${format.id}: ${format.description}`)
    .join('\n');
}

export function formatsCommand() {
  console.log(chalk.bold('\nAvailable formats\n'));
  for (const format of listFormats()) {
    console.log(`  ${chalk.cyan(format.id.padEnd(10))}${format.description}`);
    console.log(chalk.gray(`  ${''.padEnd(10)}${format.bytesPerPixel} bytes per pixel, ${format.formatConstant}`));
  }
  console.log();
}
