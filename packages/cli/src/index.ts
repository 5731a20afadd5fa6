#!/usr/bin/env node
import { errorMessage } from '@shiftctl/shared';
import { buildProgram } from './program.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
