#!/usr/bin/env node
/**
 * ragchat - Main Entry Point
 * Question answering over an Amazon Bedrock knowledge base with a ReAct loop
 */

import 'dotenv/config';
import { checkNodeVersion } from './utils/node-version.js';

// Check Node.js version before anything else
checkNodeVersion();

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { askCommand } from './commands/ask.js';
import { chatCommand } from './commands/chat.js';
import { initCommand } from './commands/init.js';
import { kbCommand } from './commands/kb.js';
import { colors } from './ui/theme.js';

const PackageSchema = z.object({ version: z.string() });
const packageJson = PackageSchema.parse(
    JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'))
);

// Graceful shutdown handling
process.on('SIGINT', () => {
    console.log('\n' + colors.muted('Interrupted. Goodbye!'));
    process.exit(0);
});

process.on('SIGTERM', () => {
    console.log('\n' + colors.muted('Terminated. Goodbye!'));
    process.exit(0);
});

const program = new Command();

program
    .name('ragchat')
    .description('Knowledge base chat CLI - answers grounded in your documents')
    .version(packageJson.version);

program.addCommand(askCommand);
program.addCommand(chatCommand);
program.addCommand(initCommand);
program.addCommand(kbCommand);

await program.parseAsync(process.argv);
