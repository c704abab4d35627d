#!/usr/bin/env node
/**
 * get-weather CLI entry point
 *
 *   get-weather --schema
 *   get-weather --execute '{"location": "New York"}'
 */

import { main } from './cli/main.js';

void main(process.argv.slice(2)).then((exitCode) => {
  process.exitCode = exitCode;
});
