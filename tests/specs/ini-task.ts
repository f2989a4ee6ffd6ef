import { testSuite, expect } from 'manten';
import { applyIniTask } from '../../src/utils/ini-task.js';
import { parseTask, type RawTask } from '../../src/utils/task-types.js';
import { KnownError, StorageError } from '../../src/utils/error.js';
import { createFixture } from '../utils.js';

const drinks = '# beverages\n[drinks]\nfav = tea\n';

const task = (raw: RawTask) => parseTask(raw);

export default testSuite(({ describe }) => {
	describe('applyIniTask', ({ describe, test }) => {
		describe('present', ({ test }) => {
			test('sets a value once and then reports no change', async () => {
				const { fixture, resolve, read } = await createFixture({
					'conf.ini': drinks,
				});
				const setFav = task({
					dest: resolve('conf.ini'),
					section: 'drinks',
					option: 'fav',
					value: 'lemonade',
				});

				const first = await applyIniTask(setFav);
				expect(first).toEqual({
					dest: resolve('conf.ini'),
					changed: true,
					msg: 'OK',
					check: false,
				});
				const written = await read('conf.ini');
				expect(written).toBe('# beverages\n[drinks]\nfav = lemonade\n');

				const second = await applyIniTask(setFav);
				expect(second.changed).toBe(false);
				expect(await read('conf.ini')).toBe(written);
				await fixture.rm();
			});

			test('creates the file and section', async () => {
				const { fixture, resolve, read } = await createFixture();
				const result = await applyIniTask(
					task({
						dest: resolve('new.ini'),
						section: 'drinks',
						option: 'temperature',
						value: 'cold',
					})
				);
				expect(result.changed).toBe(true);
				expect(await read('new.ini')).toBe('[drinks]\ntemperature = cold\n');
				await fixture.rm();
			});

			test('without a value nothing happens', async () => {
				const { fixture, resolve, exists } = await createFixture();
				const result = await applyIniTask(
					task({ dest: resolve('new.ini'), section: 'drinks', option: 'fav' })
				);
				expect(result.changed).toBe(false);
				expect(await exists('new.ini')).toBe(false);
				await fixture.rm();
			});
		});

		describe('absent', ({ test }) => {
			test('removes an option', async () => {
				const { fixture, resolve, read } = await createFixture({
					'conf.ini': drinks,
				});
				const result = await applyIniTask(
					task({
						dest: resolve('conf.ini'),
						section: 'drinks',
						option: 'fav',
						state: 'absent',
					})
				);
				expect(result.changed).toBe(true);
				expect(await read('conf.ini')).toBe('# beverages\n[drinks]\n');
				await fixture.rm();
			});

			test('removes a section', async () => {
				const { fixture, resolve, read } = await createFixture({
					'conf.ini': drinks,
				});
				const result = await applyIniTask(
					task({ dest: resolve('conf.ini'), section: 'drinks', state: 'absent' })
				);
				expect(result.changed).toBe(true);
				expect(await read('conf.ini')).toBe('# beverages\n');
				await fixture.rm();
			});

			test('missing targets leave the file alone', async () => {
				const { fixture, resolve, read, exists } = await createFixture({
					'conf.ini': drinks,
				});
				const options = await applyIniTask(
					task({
						dest: resolve('conf.ini'),
						section: 'food',
						option: 'fav',
						state: 'absent',
					})
				);
				const nothing = await applyIniTask(
					task({ dest: resolve('conf.ini'), state: 'absent' })
				);
				const missingFile = await applyIniTask(
					task({ dest: resolve('gone.ini'), section: 'drinks', state: 'absent' })
				);

				expect(options.changed).toBe(false);
				expect(nothing.changed).toBe(false);
				expect(missingFile.changed).toBe(false);
				expect(await read('conf.ini')).toBe(drinks);
				expect(await exists('gone.ini')).toBe(false);
				await fixture.rm();
			});
		});

		describe('check mode', ({ test }) => {
			test('reports the change without writing', async () => {
				const { fixture, resolve, read } = await createFixture({
					'conf.ini': drinks,
				});
				const result = await applyIniTask(
					task({
						dest: resolve('conf.ini'),
						section: 'drinks',
						option: 'fav',
						value: 'coffee',
						check: true,
					})
				);
				expect(result).toEqual({
					dest: resolve('conf.ini'),
					changed: true,
					msg: 'OK',
					check: true,
				});
				expect(await read('conf.ini')).toBe(drinks);
				await fixture.rm();
			});

			test('does not create files', async () => {
				const { fixture, resolve, exists } = await createFixture();
				const result = await applyIniTask(
					task({
						dest: resolve('new.ini'),
						section: 'drinks',
						option: 'fav',
						value: 'coffee',
						check: true,
						backup: true,
					})
				);
				expect(result.changed).toBe(true);
				expect(result.backupFile).toBeUndefined();
				expect(await exists('new.ini')).toBe(false);
				await fixture.rm();
			});
		});

		describe('backup', ({ test }) => {
			const now = () => new Date(2024, 0, 5, 7, 8, 9);

			test('copies the original before writing', async () => {
				const { fixture, resolve, read, list } = await createFixture({
					'conf.ini': drinks,
				});
				const result = await applyIniTask(
					task({
						dest: resolve('conf.ini'),
						section: 'drinks',
						option: 'fav',
						value: 'water',
						backup: true,
					}),
					now
				);

				const backupName = `conf.ini.${process.pid}.2024-01-05@07:08:09~`;
				expect(result.backupFile).toBe(resolve(backupName));
				expect(await read(backupName)).toBe(drinks);
				expect(await read('conf.ini')).toBe('# beverages\n[drinks]\nfav = water\n');
				expect((await list()).sort()).toEqual(['conf.ini', backupName]);
				await fixture.rm();
			});

			test('skips unchanged and new files', async () => {
				const { fixture, resolve, list } = await createFixture({
					'conf.ini': drinks,
				});
				const unchanged = await applyIniTask(
					task({
						dest: resolve('conf.ini'),
						section: 'drinks',
						option: 'fav',
						value: 'tea',
						backup: true,
					}),
					now
				);
				const created = await applyIniTask(
					task({
						dest: resolve('new.ini'),
						section: 'drinks',
						option: 'fav',
						value: 'tea',
						backup: true,
					}),
					now
				);

				expect(unchanged.backupFile).toBeUndefined();
				expect(created.backupFile).toBeUndefined();
				expect((await list()).sort()).toEqual(['conf.ini', 'new.ini']);
				await fixture.rm();
			});
		});

		describe('mode', ({ test }) => {
			test('a mode difference alone counts as a change', async () => {
				const { fixture, resolve, chmod, modeOf } = await createFixture({
					'conf.ini': drinks,
				});
				await chmod('conf.ini', 0o644);
				const restrict = task({
					dest: resolve('conf.ini'),
					section: 'drinks',
					option: 'fav',
					value: 'tea',
					mode: '0600',
				});

				expect((await applyIniTask(restrict)).changed).toBe(true);
				expect(await modeOf('conf.ini')).toBe(0o600);
				expect((await applyIniTask(restrict)).changed).toBe(false);
				await fixture.rm();
			});

			test('check mode leaves permissions alone', async () => {
				const { fixture, resolve, chmod, modeOf } = await createFixture({
					'conf.ini': drinks,
				});
				await chmod('conf.ini', 0o644);
				const result = await applyIniTask(
					task({ dest: resolve('conf.ini'), mode: '600', check: true })
				);
				expect(result.changed).toBe(true);
				expect(await modeOf('conf.ini')).toBe(0o644);
				await fixture.rm();
			});
		});

		test('write failures surface as StorageError', async () => {
			const { fixture, resolve } = await createFixture();
			await expect(
				applyIniTask(
					task({
						dest: resolve('missing/conf.ini'),
						section: 'drinks',
						option: 'fav',
						value: 'tea',
					})
				)
			).rejects.toThrow(StorageError);
			await fixture.rm();
		});
	});

	describe('parseTask', ({ test }) => {
		test('fills in defaults', () => {
			expect(parseTask({ dest: '/tmp/conf.ini', section: '', option: 'fav' })).toEqual({
				dest: '/tmp/conf.ini',
				section: undefined,
				option: 'fav',
				value: undefined,
				state: 'present',
				backup: false,
				check: false,
				mode: undefined,
			});
		});

		test('rejects invalid arguments', () => {
			expect(() => parseTask({})).toThrow(new KnownError('Missing destination file'));
			expect(() => parseTask({ dest: 'conf.ini', state: 'gone' })).toThrow(
				'Invalid argument state: Must be one of: present, absent'
			);
			expect(() => parseTask({ dest: 'conf.ini', mode: '999' })).toThrow(
				'Invalid argument mode: Must be an octal mode such as 0644'
			);
		});
	});
});
