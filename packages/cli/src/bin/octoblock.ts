#!/usr/bin/env node
import { createProgram } from '../program.js';
import { renderCommandRuntimeError, toCommandRuntimeError } from '../lib/command-runtime.js';

try {
  await createProgram().parseAsync(process.argv);
} catch (error) {
  const failure = toCommandRuntimeError(error);
  renderCommandRuntimeError(failure);
  process.exitCode = failure.exitCode;
}
