import { command } from 'cleye';
import { KnownError, handleCommandError } from '../utils/error.js';
import { IniFile } from '../utils/ini-file.js';
import { expandHome } from '../utils/paths.js';

export const readOption = async (
	dest: string,
	section: string | undefined,
	option: string
) => {
	const ini = await IniFile.load(expandHome(dest));
	return ini.getOption(section || null, option);
};

export default command(
	{
		name: 'get',
		description: 'Print the value of an option',
		help: {
			description: `Print the value of an option. Exits with 1 when it is not set.

Examples:
  initweak get /etc/conf --section drinks --option fav`,
		},
		parameters: ['<dest>'],
		flags: {
			section: {
				type: String,
				description: 'Section name (omit for options above the first section)',
				alias: 's',
			},
			option: {
				type: String,
				description: 'Option name',
				alias: 'o',
			},
		},
	},
	(argv) => {
		(async () => {
			const { section, option } = argv.flags;
			if (!option) {
				throw new KnownError('Missing --option');
			}

			const value = await readOption(argv._.dest, section, option);
			if (value === undefined) {
				process.exitCode = 1;
				return;
			}
			console.log(value);
		})().catch(handleCommandError);
	}
);
