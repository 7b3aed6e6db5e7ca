#!/usr/bin/env node
/**
 * create-rag-app entry point
 */

import { createProgram } from './program.ts';

await createProgram().parseAsync();
