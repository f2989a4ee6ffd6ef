import pkg from '../../package.json' with { type: 'json' };

export const { description, version } = pkg;
