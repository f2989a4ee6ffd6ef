#!/usr/bin/env node
import { cli } from 'cleye';
import { description, version } from './utils/version.js';
import initweak from './commands/initweak.js';
import getCommand from './commands/get.js';
import configCommand from './commands/config.js';

cli(
	{
		name: 'initweak',

		parameters: ['[dest]'],

		flags: {
			section: {
				type: String,
				description: 'Section name (omit for options above the first section)',
				alias: 's',
			},
			option: {
				type: String,
				description: 'Option name. May be omitted when removing a whole section',
				alias: 'o',
			},
			value: {
				type: String,
				description: 'Value to set. May be omitted when removing an option',
			},
			state: {
				type: String,
				description: 'present or absent (default: present)',
				default: 'present',
			},
			backup: {
				type: Boolean,
				description: 'Keep a timestamped copy of the file before changing it',
				alias: 'b',
			},
			check: {
				type: Boolean,
				description: 'Report whether the file would change without writing it',
				alias: 'C',
				default: false,
			},
			mode: {
				type: String,
				description: 'Permission bits the file should end up with, e.g. 0640',
				alias: 'm',
			},
			json: {
				type: Boolean,
				description: 'Print the result as JSON',
			},
			version: {
				type: Boolean,
				description: 'Show version number',
				alias: 'v',
			},
		},

		commands: [getCommand, configCommand],

		help: {
			description,
			examples: [
				'initweak /etc/conf --section drinks --option fav --value lemonade',
				'initweak /etc/conf --section drinks --option fav --state absent',
				'initweak /etc/conf --section drinks --state absent',
			],
		},
	},
	(argv) => {
		if (argv.flags.version) {
			console.log(version);
			process.exit(0);
		}

		if (!argv._.dest) {
			argv.showHelp();
			process.exit(1);
		}

		initweak({
			dest: argv._.dest,
			section: argv.flags.section,
			option: argv.flags.option,
			value: argv.flags.value,
			state: argv.flags.state,
			backup: argv.flags.backup,
			check: argv.flags.check,
			mode: argv.flags.mode,
			json: argv.flags.json,
		});
	}
);
