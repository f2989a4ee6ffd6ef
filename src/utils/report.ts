import { bold, dim, green, yellow } from 'kolorist';
import type { OutputFormat } from './config-types.js';
import type { TaskResult } from './task-types.js';

export const formatResult = (result: TaskResult, format: OutputFormat) => {
	if (format === 'json') {
		return JSON.stringify(result);
	}

	const status = result.changed
		? `${green('✔')} ${bold('changed')}`
		: `${dim('•')} ok`;
	const lines = [
		`${status} ${result.dest}${result.check ? yellow(' (check mode)') : ''}`,
	];
	if (result.backupFile) {
		lines.push(dim(`  backup: ${result.backupFile}`));
	}
	return lines.join('\n');
};
