#!/usr/bin/env node
/**
 * Translate a Viper contract to prefix-notation IR
 *
 * Usage: viperk [options] <file>
 */

import { handleCompileCommand } from "#cli";

process.exitCode = handleCompileCommand(process.argv.slice(2));
