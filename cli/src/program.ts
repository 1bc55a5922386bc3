import { Command } from 'commander';
import { DEFAULT_FORMAT } from '@pixarray/core';
import { convertCommand } from './commands/convert';
import { describeFormats, formatsCommand } from './commands/formats';
import packageJson from '../package.json';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('pixarray')
    .description('Convert images to C header files with pixel data arrays')
    .version(packageJson.version);

  // Convert command (default)
  program
    .command('convert <inputs...>', { isDefault: true })
    .description('Convert PNG/JPEG images to C headers')
    .option('-f, --format <format>', 'Output pixel format', DEFAULT_FORMAT)
    .option('-o, --output <path>', 'Output header file path (default: input_name.h)')
    .addHelpText('after', `
Available formats:
${describeFormats()}

Examples:
  pixarray logo.png --format bgr565
  pixarray icon.png --format argb8888 --output my_icon.h
  pixarray sprites/*.png --format rgba8888`)
    .action(convertCommand);

  // Formats command
  program
    .command('formats')
    .description('List supported pixel formats')
    .action(formatsCommand);

  return program;
}
