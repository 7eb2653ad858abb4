#!/usr/bin/env node
import { runCommand } from './commands.js';

process.exitCode = runCommand(process.argv.slice(2));
