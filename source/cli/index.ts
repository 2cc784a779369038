#!/usr/bin/env node
import path from 'node:path';
import chalk from 'chalk';
import meow from 'meow';
import {createRagContext, loadConfig, type RagContext} from '../rag/index.js';
import {
	formatExtractStats,
	formatIngestStats,
	formatRecall,
	formatSearchContext,
	formatSearchResults,
	getStatus,
	runExtract,
	runIngest,
	runInit,
	runRecall,
	runRemember,
	runSearch,
} from './commands/handlers.js';
import {createCliLogger, handleCliError} from './utils/error-handler.js';

const cli = meow(
	`
	Usage
	  $ coderecall <command> [options]

	Commands
	  init                      Write .coderecall/config.json
	  extract [root]            Extract units into the artifact
	  ingest                    Embed and store the artifact's units
	  search <query>            Hybrid search (dense + keyword, RRF)
	  recall <query>            Search long-term memory
	  remember                  Store one exchange in memory
	  status                    Show collection sizes

	Options
	  --project, -p   Project root (default: current directory)
	  --out, -o       Artifact path for extract
	  --artifact, -a  Artifact path for ingest
	  --limit, -l     Maximum results
	  --json          Print search results as JSON
	  --context       Print search results as prompt context
	  --user          User text (remember)
	  --assistant     Assistant text (remember)
	  --file          Referenced file, repeatable (remember)
	  --tag           Tag, repeatable (remember)
	  --force         Overwrite an existing config (init)

	Examples
	  $ coderecall extract ./src
	  $ coderecall ingest
	  $ coderecall search "parse_config yaml"
`,
	{
		importMeta: import.meta,
		flags: {
			project: {type: 'string', shortFlag: 'p'},
			out: {type: 'string', shortFlag: 'o'},
			artifact: {type: 'string', shortFlag: 'a'},
			limit: {type: 'number', shortFlag: 'l'},
			json: {type: 'boolean', default: false},
			context: {type: 'boolean', default: false},
			user: {type: 'string'},
			assistant: {type: 'string'},
			file: {type: 'string', isMultiple: true},
			tag: {type: 'string', isMultiple: true},
			force: {type: 'boolean', default: false},
		},
	},
);

const [command, ...args] = cli.input;
const projectRoot = path.resolve(cli.flags.project ?? process.cwd());
const logger = createCliLogger(projectRoot);

class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'UsageError';
	}
}

function requireArg(value: string | undefined, usage: string): string {
	if (!value) {
		throw new UsageError(`Usage: coderecall ${usage}`);
	}
	return value;
}

async function withContext<T>(run: (context: RagContext) => Promise<T>): Promise<T> {
	const context = await createRagContext({projectRoot, logger});
	try {
		return await run(context);
	} finally {
		await context.close();
	}
}

async function main(): Promise<void> {
	switch (command) {
		case 'init': {
			console.log(await runInit(projectRoot, cli.flags.force));
			return;
		}

		case 'extract': {
			const config = await loadConfig(projectRoot);
			const root = path.resolve(projectRoot, args[0] ?? '.');
			const outPath = path.resolve(
				projectRoot,
				cli.flags.out ?? config.extraction.artifactPath,
			);
			const artifact = await runExtract(root, outPath, config, logger);
			console.log(formatExtractStats(artifact, outPath));
			return;
		}

		case 'ingest': {
			await withContext(async context => {
				const artifactPath = path.resolve(
					projectRoot,
					cli.flags.artifact ?? context.config.extraction.artifactPath,
				);
				const stats = await runIngest(context, artifactPath, message => {
					process.stderr.write(chalk.dim(`\r${message}`));
				});
				process.stderr.write('\n');
				console.log(formatIngestStats(stats));
				if (stats.failedBatches.length > 0) process.exitCode = 1;
			});
			return;
		}

		case 'search': {
			const query = requireArg(args.join(' ').trim(), 'search <query>');
			await withContext(async context => {
				const results = await runSearch(context, query, cli.flags.limit);
				if (cli.flags.json) {
					console.log(JSON.stringify(results, null, 2));
				} else if (cli.flags.context) {
					console.log(formatSearchContext(results, context.config));
				} else {
					console.log(formatSearchResults(results));
				}
			});
			return;
		}

		case 'recall': {
			const query = requireArg(args.join(' ').trim(), 'recall <query>');
			await withContext(async context => {
				const entries = await runRecall(context, query, cli.flags.limit);
				console.log(formatRecall(query, entries));
			});
			return;
		}

		case 'remember': {
			const usage = 'remember --user <text> --assistant <text> [--file <path>]... [--tag <tag>]...';
			const user = requireArg(cli.flags.user, usage);
			const assistant = requireArg(cli.flags.assistant, usage);
			await withContext(async context => {
				console.log(
					await runRemember(context, {
						user,
						assistant,
						files: cli.flags.file ?? [],
						tags: cli.flags.tag ?? [],
					}),
				);
			});
			return;
		}

		case 'status': {
			await withContext(async context => {
				console.log(await getStatus(context));
			});
			return;
		}

		default:
			cli.showHelp(command === undefined ? 0 : 2);
	}
}

main().catch((error: unknown) => {
	if (error instanceof UsageError) {
		console.error(chalk.red(error.message));
		process.exitCode = 2;
		return;
	}
	handleCliError(command ?? 'cli', error, logger);
	process.exitCode = 1;
});
