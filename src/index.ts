#!/usr/bin/env node
/**
 * Health database explorer
 *
 * Read-only MCP access to a personal health-data PostgreSQL database:
 * validated raw queries, guided paging over any table, and weight, steps,
 * sleep and heart-rate views that adapt to whichever tables exist.
 *
 * Usage:
 *   npm start              - Run with .env file
 */

// Load .env file before anything else
import 'dotenv/config';

import { startServer } from './server.js';

startServer().catch((error) => {
  console.error('Fatal error starting server:', error);
  process.exit(1);
});
