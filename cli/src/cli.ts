#!/usr/bin/env node

import chalk from 'chalk';
import { createProgram } from './program';

function exitWithError(error: unknown) {
  console.error(chalk.red('Error:'), error);
  process.exit(1);
}

// Global error handler
process.on('unhandledRejection', exitWithError);

createProgram().parseAsync().catch(exitWithError);
