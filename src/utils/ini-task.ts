import fs from 'fs/promises';
import { IniFile } from './ini-file.js';
import { createBackup } from './backup.js';
import { StorageError } from './error.js';
import { fileExists, readMode } from './fs.js';
import { expandHome } from './paths.js';
import type { IniTask, TaskResult } from './task-types.js';

const editDocument = (ini: IniFile, task: IniTask) => {
	const section = task.section ?? null;
	const { option, value } = task;

	if (task.state === 'present') {
		if (option !== undefined && value !== undefined && ini.getOption(section, option) !== value) {
			ini.setOption(section, option, value);
			return true;
		}
		return false;
	}

	if (option !== undefined) {
		return ini.deleteOption(section, option);
	}
	if (task.section !== undefined) {
		return ini.deleteSection(task.section);
	}
	return false;
};

// Reports whether the permission bits differ, fixing them unless checking
const reconcileMode = async (dest: string, mode: string, check: boolean) => {
	const desired = Number.parseInt(mode, 8);
	try {
		const current = await readMode(dest);
		if (current === undefined || current === desired) {
			return false;
		}
		if (!check) {
			await fs.chmod(dest, desired);
		}
		return true;
	} catch (error) {
		throw new StorageError(`Can't set mode of ${dest}`, dest, { cause: error });
	}
};

/**
 * Brings one option or section of an INI file into the requested state.
 */
export const applyIniTask = async (
	task: IniTask,
	now = () => new Date()
): Promise<TaskResult> => {
	const dest = expandHome(task.dest);
	const ini = await IniFile.load(dest);
	const result: TaskResult = {
		dest,
		changed: editDocument(ini, task),
		msg: 'OK',
		check: task.check,
	};

	if (result.changed && !task.check) {
		if (task.backup && (await fileExists(dest))) {
			result.backupFile = await createBackup(dest, now());
		}
		await ini.save(dest);
	}

	if (task.mode !== undefined && (await reconcileMode(dest, task.mode, task.check))) {
		result.changed = true;
	}

	return result;
};
