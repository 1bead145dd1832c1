#!/usr/bin/env node
/**
 * Field Value Resolver - CLI Entry Point
 *
 * Usage:
 *   field-value-resolver            # after npm install -g
 *   node dist/bin.js                # direct invocation
 *
 * @module bin
 */

import './index.js';
