import fs from 'fs/promises';
import { StorageError } from './error.js';
import { readMode } from './fs.js';

const pad = (value: number) => String(value).padStart(2, '0');

/** Local time as `YYYY-MM-DD@HH:MM:SS`. */
export const backupTimestamp = (date: Date) =>
	`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
	`@${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const backupFileName = (
	filePath: string,
	date: Date,
	pid = process.pid
) => `${filePath}.${pid}.${backupTimestamp(date)}~`;

/**
 * Copies `filePath` beside itself with the same permission bits.
 * Returns the backup's path.
 */
export const createBackup = async (filePath: string, date = new Date()) => {
	const backupFile = backupFileName(filePath, date);
	try {
		await fs.copyFile(filePath, backupFile);
		const mode = await readMode(filePath);
		if (mode !== undefined) {
			await fs.chmod(backupFile, mode);
		}
	} catch (error) {
		throw new StorageError(`Can't back up ${filePath}`, filePath, {
			cause: error,
		});
	}
	return backupFile;
};
