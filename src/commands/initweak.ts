import { log } from '@clack/prompts';
import { getConfig } from '../utils/config.js';
import type { RawConfig, ValidConfig } from '../utils/config-types.js';
import { handleCommandError } from '../utils/error.js';
import { applyIniTask } from '../utils/ini-task.js';
import { formatResult } from '../utils/report.js';
import { parseTask, type RawTask } from '../utils/task-types.js';

export type TaskFlags = RawTask & {
	json?: boolean;
};

/**
 * Resolves flags against the configured defaults, runs the task and returns
 * the report line(s).
 */
export const runTask = async (
	flags: TaskFlags,
	loadConfig: (cliConfig: RawConfig) => Promise<ValidConfig> = getConfig
) => {
	const config = await loadConfig(flags.json ? { output: 'json' } : {});
	const task = parseTask({
		...flags,
		backup: flags.backup ?? config.backup,
		mode: flags.mode ?? config.mode,
	});

	if (task.state === 'present' && task.option !== undefined && task.value === undefined) {
		log.warn(`No value given for "${task.option}", nothing to set`);
	}

	const result = await applyIniTask(task);
	return { result, output: formatResult(result, config.output) };
};

export default (flags: TaskFlags) =>
	(async () => {
		const { output } = await runTask(flags);
		console.log(output);
	})().catch(handleCommandError);
