#!/usr/bin/env node
/**
 * trellis CLI entry point.
 */

import { closeLogger } from '../core/logger.js';
import { createProgram } from './program.js';

await createProgram().parseAsync();
closeLogger();
