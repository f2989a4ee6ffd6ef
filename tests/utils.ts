import fs from 'fs/promises';
import path from 'path';
import { createFixture as createFsFixture } from 'fs-fixture';

type FixtureSource = Parameters<typeof createFsFixture>[0];

export const createFixture = async (source?: FixtureSource) => {
	const fixture = await createFsFixture(source);
	const resolve = (name: string) => path.join(fixture.path, name);

	return {
		fixture,
		resolve,
		read: (name: string) => fs.readFile(resolve(name), 'utf8'),
		exists: (name: string) =>
			fs.access(resolve(name)).then(
				() => true,
				() => false
			),
		list: () => fs.readdir(fixture.path),
		chmod: (name: string, mode: number) => fs.chmod(resolve(name), mode),
		modeOf: async (name: string) =>
			(await fs.stat(resolve(name))).mode & 0o777,
	};
};
