import { dim, red } from 'kolorist';
import { outro } from '@clack/prompts';
import { version } from './version.js';

export class KnownError extends Error {}

/**
 * The target file could not be read or written.
 */
export class StorageError extends KnownError {
	constructor(
		message: string,
		readonly path: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = 'StorageError';
	}
}

const indent = '    ';

export const handleCliError = (error: unknown) => {
	if (error instanceof Error && !(error instanceof KnownError)) {
		if (error.stack) {
			console.error(dim(error.stack.split('\n').slice(1).join('\n')));
		}
		console.error(`\n${indent}${dim(`initweak v${version}`)}`);
		console.error(
			`\n${indent}This is a bug. Please report it with the information above.`
		);
	}
};

export const errorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

export const handleCommandError = (error: unknown) => {
	outro(`${red('✖')} ${errorMessage(error)}`);
	handleCliError(error);
	process.exit(1);
};
