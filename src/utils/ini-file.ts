import fs from 'fs/promises';
import path from 'path';
import { StorageError } from './error.js';
import { isMissingFileError, readMode } from './fs.js';

const sectionPattern = /^\[([^\]]+)\]/;
const optionPattern = /^([^\s=]+)\s*=\s*(.*)/;

/** `null` is the implicit section above the first header. */
export type SectionName = string | null;

export type IniLine =
	| { kind: 'blank' }
	| { kind: 'comment' }
	| { kind: 'section'; name: string }
	| { kind: 'option'; key: string; value: string }
	| { kind: 'other' };

export const classifyLine = (line: string): IniLine => {
	const trimmed = line.trim();
	if (trimmed.length === 0) {
		return { kind: 'blank' };
	}
	if (trimmed.startsWith('#') || trimmed.startsWith(';')) {
		return { kind: 'comment' };
	}

	const section = sectionPattern.exec(trimmed);
	if (section) {
		return { kind: 'section', name: section[1] };
	}

	const option = optionPattern.exec(trimmed);
	if (option) {
		return { kind: 'option', key: option[1], value: option[2] };
	}

	return { kind: 'other' };
};

export const renderOption = (option: string, value: string) =>
	`${option} = ${value}\n`;

/** Splits after every `\n`, so each line keeps its own terminator. */
export const splitLines = (text: string) =>
	text === '' ? [] : text.split(/(?<=\n)/);

// [header, end) line range; header is -1 for the leading span
type SectionSpan = {
	header: number;
	end: number;
};

type NamedSpan = SectionSpan & {
	name: string;
};

type SectionIndex = {
	leading: SectionSpan;
	named: NamedSpan[];
};

/**
 * Line-oriented INI document. Edits touch only the lines they must;
 * everything else is kept byte for byte.
 */
export class IniFile {
	private index?: SectionIndex;

	constructor(private readonly lines: string[] = []) {}

	static parse(text: string) {
		return new IniFile(splitLines(text));
	}

	/**
	 * Reads `filePath` into a document. A missing file gives an empty one.
	 */
	static async load(filePath: string) {
		let text: string;
		try {
			text = await fs.readFile(filePath, 'utf8');
		} catch (error) {
			if (isMissingFileError(error)) {
				return new IniFile();
			}
			throw new StorageError(`Can't read ${filePath}`, filePath, {
				cause: error,
			});
		}
		return IniFile.parse(text);
	}

	get lineCount() {
		return this.lines.length;
	}

	toString() {
		return this.lines.join('');
	}

	getOption(section: SectionName, option: string): string | undefined {
		return this.findOption(section, option)?.value;
	}

	/**
	 * Writes `option = value` into `section`, replacing the first matching
	 * line, appending to the end of the section, or creating the section at
	 * the end of the document.
	 */
	setOption(section: SectionName, option: string, value: string) {
		const rendered = renderOption(option, value);
		if (section === null) {
			this.upsertInSpan(this.sections().leading, option, rendered);
			return;
		}

		const span = this.sections().named.find(
			(candidate) => candidate.name === section
		);
		if (span) {
			this.upsertInSpan(span, option, rendered);
		} else {
			this.appendSection(section, rendered);
		}
	}

	/** Removes the first matching option line only. */
	deleteOption(section: SectionName, option: string) {
		const found = this.findOption(section, option);
		if (!found) {
			return false;
		}

		this.lines.splice(found.index, 1);
		this.invalidate();
		return true;
	}

	/**
	 * Removes the first `[section]` header and everything up to the next
	 * header, or to the end of the document.
	 */
	deleteSection(section: string) {
		const span = this.sections().named.find(
			(candidate) => candidate.name === section
		);
		if (!span) {
			return false;
		}

		this.lines.splice(span.header, span.end - span.header);
		this.invalidate();
		return true;
	}

	/**
	 * Replaces `filePath` with the document through a temporary file in the
	 * same directory, keeping the permission bits of the file it replaces.
	 */
	async save(filePath: string) {
		const target = await fs.realpath(filePath).catch((error: unknown) => {
			if (isMissingFileError(error)) {
				return filePath;
			}
			throw new StorageError(`Can't create ${filePath}`, filePath, {
				cause: error,
			});
		});
		const temporary = path.join(
			path.dirname(target),
			`.${path.basename(target)}.${process.pid}.tmp`
		);

		try {
			const mode = await readMode(target);
			await fs.writeFile(temporary, this.toString(), 'utf8');
			if (mode !== undefined) {
				await fs.chmod(temporary, mode);
			}
			await fs.rename(temporary, target);
		} catch (error) {
			await fs.rm(temporary, { force: true });
			throw new StorageError(`Can't create ${filePath}`, filePath, {
				cause: error,
			});
		}
	}

	private spansOf(section: SectionName): SectionSpan[] {
		const sections = this.sections();
		if (section === null) {
			return [sections.leading];
		}
		return sections.named.filter((candidate) => candidate.name === section);
	}

	private findOption(section: SectionName, option: string) {
		for (const span of this.spansOf(section)) {
			for (let index = span.header + 1; index < span.end; index += 1) {
				const line = classifyLine(this.lines[index]);
				if (line.kind === 'option' && line.key === option) {
					return { index, value: line.value };
				}
			}
		}
		return undefined;
	}

	private sections(): SectionIndex {
		if (this.index) {
			return this.index;
		}

		const leading: SectionSpan = { header: -1, end: this.lines.length };
		const named: NamedSpan[] = [];
		let current: SectionSpan = leading;

		this.lines.forEach((text, lineIndex) => {
			const line = classifyLine(text);
			if (line.kind !== 'section') {
				return;
			}
			current.end = lineIndex;
			const span: NamedSpan = {
				name: line.name,
				header: lineIndex,
				end: this.lines.length,
			};
			named.push(span);
			current = span;
		});

		this.index = { leading, named };
		return this.index;
	}

	// Only the first span of a duplicated section is considered
	private upsertInSpan(span: SectionSpan, option: string, rendered: string) {
		let lastContent = span.header;
		for (let index = span.header + 1; index < span.end; index += 1) {
			const line = classifyLine(this.lines[index]);
			if (line.kind === 'option' && line.key === option) {
				this.replaceLine(index, rendered);
				return;
			}
			if (line.kind === 'option' || line.kind === 'comment') {
				lastContent = index;
			}
		}

		this.insertLine(lastContent + 1, rendered);
	}

	private invalidate() {
		this.index = undefined;
	}

	private replaceLine(index: number, text: string) {
		this.lines[index] = text;
		this.invalidate();
	}

	private insertLine(index: number, text: string) {
		if (index > 0) {
			this.terminate(index - 1);
		}
		this.lines.splice(index, 0, text);
		this.invalidate();
	}

	private appendSection(section: string, rendered: string) {
		const last = this.lines.length - 1;
		if (last >= 0) {
			this.terminate(last);
			if (classifyLine(this.lines[last]).kind !== 'blank') {
				this.lines.push('\n');
			}
		}
		this.lines.push(`[${section}]\n`, rendered);
		this.invalidate();
	}

	// so an inserted line never merges with an unterminated one before it
	private terminate(index: number) {
		if (!this.lines[index].endsWith('\n')) {
			this.lines[index] += '\n';
		}
	}
}
