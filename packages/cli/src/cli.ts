#!/usr/bin/env node

/**
 * ticketdesk CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
