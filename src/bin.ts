#!/usr/bin/env node
import { registerNodeRuntime } from './runtime.js';
import { run } from './cli.js';

registerNodeRuntime();

process.exitCode = await run(process.argv.slice(2));
