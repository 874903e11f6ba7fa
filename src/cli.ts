#!/usr/bin/env node

/**
 * logrelay - CLI
 */

import { createProgram } from "./program.js";

createProgram().parse();
