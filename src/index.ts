#!/usr/bin/env node

import { Command } from 'commander';
import { setupCommand } from './commands/setup.js';
import { DEFAULT_REPO_NAME } from './utils/config.js';

const program = new Command();

program
    .name('showcase-publish')
    .description('Prepare a static site for GitHub and Vercel')
    .version('1.0.0')
    .helpOption(false)
    .option('-u, --username <identity>', 'GitHub username (prompted when omitted)')
    .option('-r, --repo <name>', 'repository name', DEFAULT_REPO_NAME)
    .option('-h, --help', 'show usage and exit')
    .action(setupCommand);

await program.parseAsync();
