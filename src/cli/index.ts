#!/usr/bin/env node
import { runCli } from './program';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('cpf-redact failed:', error);
    process.exitCode = 1;
  });
