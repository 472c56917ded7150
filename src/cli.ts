#!/usr/bin/env node
import 'dotenv/config';
import { buildProgram } from './cli/program.js';

const program = buildProgram({}, (code) => {
  process.exitCode = code;
});

await program.parseAsync(process.argv);
