#!/usr/bin/env node
/**
 * gatesync CLI entrypoint
 */

import './cli.js';
