import { KnownError } from './error.js';
import { modePattern } from './config-types.js';

const taskStates = ['present', 'absent'] as const;

export type TaskState = (typeof taskStates)[number];

export type IniTask = {
	dest: string;
	section?: string;
	option?: string;
	value?: string;
	state: TaskState;
	backup: boolean;
	check: boolean;
	mode?: string;
};

export type TaskResult = {
	dest: string;
	changed: boolean;
	msg: 'OK';
	check: boolean;
	backupFile?: string;
};

export type RawTask = {
	dest?: string;
	section?: string;
	option?: string;
	value?: string;
	state?: string;
	backup?: boolean;
	check?: boolean;
	mode?: string;
};

const argumentAssert = (name: string, condition: boolean, message: string) => {
	if (!condition) {
		throw new KnownError(`Invalid argument ${name}: ${message}`);
	}
};

const isTaskState = (state: string): state is TaskState =>
	taskStates.some((candidate) => candidate === state);

// An empty section or option counts as not given
const presence = (value?: string) => (value === '' ? undefined : value);

export const parseTask = (raw: RawTask): IniTask => {
	const { dest, state = 'present', mode } = raw;

	if (!dest) {
		throw new KnownError('Missing destination file');
	}
	if (!isTaskState(state)) {
		throw new KnownError(
			`Invalid argument state: Must be one of: ${taskStates.join(', ')}`
		);
	}
	if (mode !== undefined) {
		argumentAssert('mode', modePattern.test(mode), 'Must be an octal mode such as 0644');
	}

	return {
		dest,
		section: presence(raw.section),
		option: presence(raw.option),
		value: raw.value,
		state,
		backup: raw.backup ?? false,
		check: raw.check ?? false,
		mode,
	};
};
