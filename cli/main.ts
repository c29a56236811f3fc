#!/usr/bin/env node
import { runCli } from './dispatcher.js';

process.exitCode = await runCli(process.argv.slice(2));
