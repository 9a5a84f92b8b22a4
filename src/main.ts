#!/usr/bin/env node
/**
 * Entry point. Loads `.env`, runs one audit, and exits with its status.
 *
 * Usage: npm start -- [--limit 0.5] [--group scicomp] [--write] [--verbose|--debug]
 */
import 'dotenv/config';

import { runCli } from '@/cli/run.js';

process.exitCode = await runCli(process.argv.slice(2));
