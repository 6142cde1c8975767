#!/usr/bin/env -S node --import tsx
/**
 * @recordc/cli - compile record schemas into C parsers
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { validateCommand } from './commands/validate.js';
import { generateCommand } from './commands/generate.js';
import { parseCommand } from './commands/parse.js';
import { doctorCommand } from './commands/doctor.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
  ? pkg.version
  : '0.0.0';

const program = new Command();

program
  .name('recordc')
  .description('Compile flat record schemas into native parsers')
  .version(version);

program.addCommand(validateCommand);
program.addCommand(generateCommand);
program.addCommand(parseCommand);
program.addCommand(doctorCommand);

await program.parseAsync();
