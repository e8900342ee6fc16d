#!/usr/bin/env node

/**
 * CLI entry point for unoconv-convert
 */

import { createProgram } from "./program";

await createProgram().parseAsync();
