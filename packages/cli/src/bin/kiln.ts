#!/usr/bin/env node
/**
 * kiln binary entry point
 */

import { main } from '../cli.js';

process.exitCode = await main();
