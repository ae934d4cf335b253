#!/usr/bin/env node
/**
 * CLI entry point for telegram-pipeline. Loads `.env` before any command reads
 * the environment.
 *
 * @module
 */

import 'dotenv/config';

import { createProgram } from './program.js';

await createProgram().parseAsync();
