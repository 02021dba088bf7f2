#!/usr/bin/env node
import { runCli } from './cli';

runCli(process.argv.slice(2), {
  out: function (text: string) {
    process.stdout.write(text);
  },
  console: console
}, {
  env: process.env,
  cwd: process.cwd()
}).then(function (code) {
  process.exitCode = code;
}).catch(function (err: unknown) {
  console.error('FATAL: ' + (err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
