/**
 * Shared helpers for scripts
 */

import 'dotenv/config';
import {existsSync, mkdirSync, readFileSync, writeFileSync} from 'node:fs';
import {dirname} from 'node:path';

/**
 * Get a command-line argument value
 *
 * @param args - Arguments after the script name
 * @param name - Flag name, e.g. "--output"
 * @returns The value following the flag, or undefined
 */
export function getArg(args: string[], name: string): string | undefined {
	const index = args.indexOf(name);
	if (index !== -1 && args[index + 1]) {
		return args[index + 1];
	}
	return undefined;
}

/**
 * Get a required command-line argument, exiting with an error when it is missing
 */
export function requireArg(args: string[], name: string): string {
	const value = getArg(args, name);
	if (value === undefined) {
		console.error(`Error: ${name} <file> is required (see --help)`);
		process.exit(1);
	}
	return value;
}

/**
 * Read a UTF-8 text file, exiting with an error when it does not exist
 */
export function readTextFile(path: string, label: string): string {
	if (!existsSync(path)) {
		console.error(`Error: ${label} file not found: ${path}`);
		process.exit(1);
	}
	return readFileSync(path, 'utf-8');
}

/**
 * Write a text file, creating its directory first
 */
export function writeTextFile(path: string, content: string): void {
	const dir = dirname(path);
	if (!existsSync(dir)) {
		mkdirSync(dir, {recursive: true});
	}
	writeFileSync(path, content, 'utf-8');
}
