import { command } from 'cleye';
import { getConfig, setConfigs } from '../utils/config.js';
import { isConfigKey, type ValidConfig } from '../utils/config-types.js';
import { KnownError, handleCommandError } from '../utils/error.js';

export const parseKeyValue = (keyValue: string): [key: string, value: string] => {
	const separator = keyValue.indexOf('=');
	if (separator === -1) {
		throw new KnownError(`Expected key=value, got: ${keyValue}`);
	}
	return [keyValue.slice(0, separator), keyValue.slice(separator + 1)];
};

/** Lines printed by `initweak config [get] [keys...]`. */
export const describeConfig = async (
	keys: string[],
	loadConfig: () => Promise<ValidConfig> = getConfig
) => {
	for (const key of keys) {
		if (!isConfigKey(key)) {
			throw new KnownError(`Invalid config property: ${key}`);
		}
	}

	const config = await loadConfig();
	const selected = keys.length > 0 ? keys : Object.keys(config);
	return Object.entries(config)
		.filter(([key]) => selected.includes(key))
		.map(([key, value]) => `${key}=${value ?? ''}`);
};

export default command(
	{
		name: 'config',
		description: 'View or modify default settings',
		help: {
			description: `View or modify default settings

Examples:
  initweak config                      Show every setting
  initweak config get output           Show one setting
  initweak config set backup=true      Always back up edited files`,
		},
		parameters: ['[mode]', '[key=value...]'],
	},
	(argv) => {
		(async () => {
			const [mode, ...keyValues] = argv._;

			if (!mode || mode === 'get') {
				for (const line of await describeConfig(keyValues)) {
					console.log(line);
				}
				return;
			}

			if (mode === 'set') {
				await setConfigs(keyValues.map(parseKeyValue));
				return;
			}

			throw new KnownError(`Invalid mode: ${mode}`);
		})().catch(handleCommandError);
	}
);
