#!/usr/bin/env node
/**
 * installer-integrity CLI entrypoint
 *
 * The CLI handles its own argument parsing.
 */

import './cli.js';
