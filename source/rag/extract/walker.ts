import fs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';

const README_CANDIDATES = ['README.md', 'readme.md', 'Readme.md'];

export interface WalkOptions {
	/** Extensions to include, with leading dot (".py") */
	extensions: string[];
	/** Directory names skipped at any depth */
	excludeDirs: string[];
}

export type ReadResult =
	| {ok: true; content: string}
	| {ok: false; reason: string};

function ignorePatterns(excludeDirs: string[]): string[] {
	return excludeDirs.map(dir => `**/${dir}/**`);
}

/**
 * Normalize a path to forward slashes.
 */
export function toPosixPath(filePath: string): string {
	return filePath.split(path.sep).join('/');
}

/**
 * List source files under root as sorted, forward-slash relative paths.
 */
export async function listSourceFiles(
	root: string,
	options: WalkOptions,
): Promise<string[]> {
	const extensions = new Set(options.extensions.map(e => e.toLowerCase()));

	const files = await fg('**/*', {
		cwd: root,
		dot: true,
		onlyFiles: true,
		followSymbolicLinks: false,
		ignore: ignorePatterns(options.excludeDirs),
	});

	return files
		.filter(file => extensions.has(path.posix.extname(file).toLowerCase()))
		.sort();
}

/**
 * Read a file as UTF-8 unless it exceeds maxBytes or cannot be read.
 * Oversized files are skipped, never truncated.
 */
export async function readSourceFile(
	absolutePath: string,
	maxBytes: number,
): Promise<ReadResult> {
	try {
		const stats = await fs.stat(absolutePath);
		if (stats.size > maxBytes) {
			return {
				ok: false,
				reason: `too large (${stats.size} bytes > ${maxBytes})`,
			};
		}
		return {ok: true, content: await fs.readFile(absolutePath, 'utf-8')};
	} catch (error) {
		return {
			ok: false,
			reason: `unreadable (${error instanceof Error ? error.message : String(error)})`,
		};
	}
}

/**
 * README text: a root README.md in any common casing, else the first
 * readme.md found deeper. Empty string when there is none.
 */
export async function findReadme(
	root: string,
	options: Pick<WalkOptions, 'excludeDirs'> & {maxBytes: number},
): Promise<string> {
	for (const candidate of README_CANDIDATES) {
		const result = await readSourceFile(path.join(root, candidate), options.maxBytes);
		if (result.ok) return result.content;
	}

	const deeper = await fg('**/readme.md', {
		cwd: root,
		dot: false,
		onlyFiles: true,
		caseSensitiveMatch: false,
		followSymbolicLinks: false,
		ignore: ignorePatterns(options.excludeDirs),
	});

	for (const file of deeper.sort()) {
		const result = await readSourceFile(path.join(root, file), options.maxBytes);
		if (result.ok && result.content) return result.content;
	}

	return '';
}
