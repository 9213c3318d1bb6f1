#!/usr/bin/env tsx
/**
 * stitch CLI entry point
 */

import { runCLI } from '../cli/main'

await runCLI()
