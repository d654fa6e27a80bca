#!/usr/bin/env node

/**
 * gitlab - call any GitLab REST API method from the command line
 *
 * Usage:
 *   gitlab project 42 --pretty
 *   gitlab projects --per-page=10 --no-archived
 *   gitlab --all groups
 */

import { createProgram } from './cli/program.js';
import { createCliContext } from './cli/shared.js';

const rawArgs: string[] = process.argv.slice(2);
const normalizedArgs: string[] = rawArgs[0] === '--' ? rawArgs.slice(1) : rawArgs;

const ctx = createCliContext();
const program = createProgram(ctx);

await program.parseAsync(['node', 'gitlab', ...normalizedArgs]);
