#!/usr/bin/env node
/**
 * Document Q&A MCP Server - CLI Entry Point
 *
 * Usage:
 *   docqa-mcp                       # after npm install -g
 *   node dist/src/index.js          # direct invocation
 *
 * @module bin
 */

import './index.js';
