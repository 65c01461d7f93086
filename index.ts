#!/usr/bin/env node
import logger, { installConsoleRedirect } from './server/logger.js';
import { runCli } from './server/cli.js';

installConsoleRedirect(logger);

process.exitCode = await runCli(process.argv.slice(2), logger);
logger.flush();
