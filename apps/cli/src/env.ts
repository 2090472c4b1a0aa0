/**
 * Environment bootstrap. Imported first so .env values are visible to every
 * module that reads process.env at load time (the shared logger included).
 */

import 'dotenv/config';

// Structured logs would interleave with the spinner
process.env['LOG_LEVEL'] ??= 'warn';
