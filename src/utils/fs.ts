import fs from 'fs/promises';

export const fileExists = (filePath: string) =>
	fs.lstat(filePath).then(
		() => true,
		() => false
	);

export const isMissingFileError = (error: unknown) =>
	error instanceof Error && 'code' in error && error.code === 'ENOENT';

/** Permission bits of a file, or undefined when it does not exist. */
export const readMode = async (filePath: string): Promise<number | undefined> => {
	try {
		const stats = await fs.stat(filePath);
		return stats.mode & 0o7777;
	} catch (error) {
		if (isMissingFileError(error)) {
			return undefined;
		}
		throw error;
	}
};
