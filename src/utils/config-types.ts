import { KnownError } from './error.js';

const outputFormats = ['text', 'json'] as const;

export type OutputFormat = (typeof outputFormats)[number];

const { hasOwnProperty } = Object.prototype;
const hasOwn = (object: unknown, key: PropertyKey) =>
	hasOwnProperty.call(object, key);

const parseAssert = (name: string, condition: boolean, message: string) => {
	if (!condition) {
		throw new KnownError(`Invalid config property ${name}: ${message}`);
	}
};

const isOutputFormat = (value: string): value is OutputFormat =>
	outputFormats.some((format) => format === value);

export const modePattern = /^0?[0-7]{3}$/;

const configParsers = {
	backup(value?: string | boolean) {
		if (value === undefined) return false;
		if (typeof value === 'boolean') return value;
		const v = value.trim().toLowerCase();
		if (v === '') return false;
		parseAssert(
			'backup',
			['true', 'false', 'yes', 'no', '1', '0'].includes(v),
			'Must be true or false'
		);
		return v === 'true' || v === 'yes' || v === '1';
	},
	output(value?: string) {
		if (!value || value.trim() === '') return 'text' as const;
		const v = value.trim().toLowerCase();
		if (!isOutputFormat(v)) {
			throw new KnownError(
				`Invalid config property output: Must be one of: ${outputFormats.join(', ')}`
			);
		}
		return v;
	},
	mode(value?: string) {
		if (!value || value.trim() === '') return undefined;
		const v = value.trim();
		parseAssert('mode', modePattern.test(v), 'Must be an octal mode such as 0644');
		return v;
	},
} as const;

type ConfigKeys = keyof typeof configParsers;

type RawConfig = {
	[key in ConfigKeys]?: string;
};

export type ValidConfig = {
	[Key in ConfigKeys]: ReturnType<(typeof configParsers)[Key]>;
};

export const isConfigKey = (key: string): key is ConfigKeys =>
	hasOwn(configParsers, key);

export { configParsers, type ConfigKeys, type RawConfig };
