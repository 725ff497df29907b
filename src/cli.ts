#!/usr/bin/env node
// src/cli.ts
import 'reflect-metadata';
import { Command } from 'commander';
import { convertCommand } from './commands/convert.command';
import { generateCommand } from './commands/generate.command';
import { getErrorMessageAndStack } from './utils/errorUtils';

const program = new Command();

program
    .name('call-records-csv')
    .description('Flatten call record JSON/JSONL files into a validated CSV');

program.addCommand(convertCommand, { isDefault: true });
program.addCommand(generateCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
    const { message } = getErrorMessageAndStack(error);
    process.stderr.write(`Error: ${message}\n`);
    process.exitCode = 1;
});
