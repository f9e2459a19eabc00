#!/usr/bin/env node
/**
 * iap-token CLI
 * Obtain and keep fresh tokens for resources behind an identity-aware proxy
 */

import { Command } from 'commander';
import { createConfigCommand } from './commands/config.js';
import { createAuthCommand } from './commands/auth.js';
import { createTokenCommand, createRequestCommand, createWatchCommand } from './commands/token.js';
import { VERSION } from './version.js';

const program = new Command();

program
    .name('iap-token')
    .description('iap-token-broker — tokens for resources behind an identity-aware proxy')
    .version(VERSION);

program.addCommand(createConfigCommand());
program.addCommand(createAuthCommand());
program.addCommand(createTokenCommand());
program.addCommand(createRequestCommand());
program.addCommand(createWatchCommand());

program.parse();
