#!/usr/bin/env node

/**
 * totcli entry point.
 */

import { runCli } from './cli.js';

process.exitCode = await runCli(process.argv.slice(2));
