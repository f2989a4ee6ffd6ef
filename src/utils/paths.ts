import path from 'path';
import os from 'os';

const APP_NAME = 'initweak';

function xdgConfigHome(): string {
	const env = process.env.XDG_CONFIG_HOME;
	if (env && path.isAbsolute(env)) return env;
	return path.join(os.homedir(), '.config');
}

/** Directory for user-level config: $XDG_CONFIG_HOME/initweak */
export function getConfigDir(): string {
	return path.join(xdgConfigHome(), APP_NAME);
}

/**
 * Resolve the tool's own config file.
 * Priority: $INITWEAK_CONFIG > $XDG_CONFIG_HOME/initweak/config
 */
export function resolveConfigPath(): string {
	const envOverride = process.env.INITWEAK_CONFIG;
	if (envOverride && path.isAbsolute(envOverride)) {
		return envOverride;
	}
	return path.join(getConfigDir(), 'config');
}

/** Expands a leading `~` to the home directory. */
export function expandHome(filePath: string): string {
	if (filePath === '~') return os.homedir();
	if (filePath.startsWith('~/')) {
		return path.join(os.homedir(), filePath.slice(2));
	}
	return filePath;
}
