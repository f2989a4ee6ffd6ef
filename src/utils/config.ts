import fs from 'fs/promises';
import path from 'path';
import ini from 'ini';
import { fileExists } from './fs.js';
import { KnownError } from './error.js';
import { IniFile } from './ini-file.js';
import { resolveConfigPath } from './paths.js';
import {
	configParsers,
	isConfigKey,
	type ConfigKeys,
	type RawConfig,
	type ValidConfig,
} from './config-types.js';

const readConfigFile = async (configPath: string): Promise<RawConfig> => {
	const config: RawConfig = {};
	if (!(await fileExists(configPath))) {
		return config;
	}

	const parsed: Record<string, unknown> = ini.parse(
		await fs.readFile(configPath, 'utf8')
	);
	for (const [key, value] of Object.entries(parsed)) {
		// ini turns "true"/"false" into booleans and [sections] into objects
		if (
			isConfigKey(key) &&
			(typeof value === 'string' || typeof value === 'boolean')
		) {
			config[key] = String(value);
		}
	}
	return config;
};

const readEnvConfig = (env: NodeJS.ProcessEnv): RawConfig => ({
	backup: env.INITWEAK_BACKUP,
	output: env.INITWEAK_OUTPUT,
	mode: env.INITWEAK_MODE,
});

/**
 * Tool defaults. Precedence: CLI flags, then environment, then the config file.
 */
export const getConfig = async (
	cliConfig: RawConfig = {},
	envConfig: RawConfig = readEnvConfig(process.env),
	configPath = resolveConfigPath()
): Promise<ValidConfig> => {
	const fileConfig = await readConfigFile(configPath);
	const pick = (key: ConfigKeys) =>
		cliConfig[key] ?? envConfig[key] ?? fileConfig[key];

	return {
		backup: configParsers.backup(pick('backup')),
		output: configParsers.output(pick('output')),
		mode: configParsers.mode(pick('mode')),
	};
};

/**
 * Writes keys into the config file, keeping its comments and layout.
 */
export const setConfigs = async (
	keyValues: [key: string, value: string][],
	configPath = resolveConfigPath()
) => {
	const config = await IniFile.load(configPath);

	for (const [key, value] of keyValues) {
		if (!isConfigKey(key)) {
			throw new KnownError(`Invalid config property: ${key}`);
		}
		configParsers[key](value);
		config.setOption(null, key, value);
	}

	await fs.mkdir(path.dirname(configPath), { recursive: true });
	await config.save(configPath);
};
