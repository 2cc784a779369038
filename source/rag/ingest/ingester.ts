/**
 * Ingester - Loads an extraction artifact into the codebase collection.
 *
 * Pipeline:
 * 1. Read and validate the artifact
 * 2. Turn each file's ast_items, then file_chunks, into payloads
 * 3. Embed the trimmed code in batches
 * 4. Upsert CodeRecords in batches (ids are content-derived, so re-runs overwrite)
 */

import pLimit from 'p-limit';
import type {RagConfig} from '../config/index.js';
import type {EmbeddingProvider} from '../embeddings/types.js';
import {toError} from '../errors.js';
import {readArtifact} from '../extract/extractor.js';
import type {ArtifactUnit, ExtractionArtifact} from '../extract/types.js';
import type {Logger} from '../logger/index.js';
import {upsertInBatches} from '../storage/batching.js';
import {codeRecordId} from '../storage/ids.js';
import type {CodePayload, CodeRecord, IndexStore} from '../storage/types.js';
import {
	createEmptyIngestStats,
	type IngestStats,
	type ProgressCallback,
} from './types.js';

export type IngestSettings = RagConfig['ingest'];

export interface IngesterDeps {
	embeddings: EmbeddingProvider;
	store: IndexStore;
	settings: IngestSettings;
	logger?: Logger;
}

export interface IngestOptions {
	/** Progress callback for UI updates */
	progressCallback?: ProgressCallback;
}

/**
 * Build the payload of one artifact unit, or null when its code is blank.
 */
export function unitPayload(
	filePath: string,
	item: ArtifactUnit,
	repoRoot: string,
): CodePayload | null {
	const code = item.code.trim();
	if (code.length === 0) return null;

	return {
		file: filePath,
		name: item.name,
		symbol: item.symbol,
		type: item.type,
		language: item.language,
		start_line: item.start_line,
		end_line: item.end_line,
		docstring: item.docstring,
		preceding_comments: item.preceding_comments,
		code,
		repo_root: repoRoot,
	};
}

/**
 * Payloads for every non-blank unit, syntax units before windows per file.
 */
export function artifactPayloads(artifact: ExtractionArtifact): {
	payloads: CodePayload[];
	unitsSeen: number;
	skippedEmpty: number;
} {
	const payloads: CodePayload[] = [];
	let unitsSeen = 0;
	let skippedEmpty = 0;

	for (const [filePath, info] of Object.entries(artifact.parsed_code)) {
		for (const item of [...info.ast_items, ...info.file_chunks]) {
			unitsSeen++;
			const payload = unitPayload(filePath, item, artifact.repo_root);
			if (payload) {
				payloads.push(payload);
			} else {
				skippedEmpty++;
			}
		}
	}

	return {payloads, unitsSeen, skippedEmpty};
}

export class Ingester {
	private readonly embeddings: EmbeddingProvider;
	private readonly store: IndexStore;
	private readonly settings: IngestSettings;
	private readonly logger: Logger | null;

	constructor(deps: IngesterDeps) {
		this.embeddings = deps.embeddings;
		this.store = deps.store;
		this.settings = deps.settings;
		this.logger = deps.logger ?? null;
	}

	/**
	 * Read an artifact from disk and ingest it.
	 */
	async ingestFile(
		artifactPath: string,
		options: IngestOptions = {},
	): Promise<IngestStats> {
		const artifact = await readArtifact(artifactPath);
		this.logger?.info('Ingest', `Ingesting ${artifactPath}`, {
			repoRoot: artifact.repo_root,
		});
		return this.ingest(artifact, options);
	}

	/**
	 * Embed and upsert every non-blank unit of an artifact.
	 *
	 * A failed embedding or upsert batch is recorded in the stats and the
	 * remaining batches still run.
	 */
	async ingest(
		artifact: ExtractionArtifact,
		options: IngestOptions = {},
	): Promise<IngestStats> {
		const stats = createEmptyIngestStats();
		const {progressCallback} = options;
		const {payloads, unitsSeen, skippedEmpty} = artifactPayloads(artifact);

		stats.filesSeen = Object.keys(artifact.parsed_code).length;
		stats.unitsSeen = unitsSeen;
		stats.skippedEmpty = skippedEmpty;

		if (payloads.length === 0) {
			this.logger?.warn('Ingest', 'Artifact has no units to ingest');
			return stats;
		}

		// 1. Embed in batches
		const records = await this.embedPayloads(payloads, stats, progressCallback);

		// 2. Upsert in batches
		progressCallback?.(0, records.length, 'Writing records');
		const result = await upsertInBatches(this.store, 'codebase', records, {
			batchSize: this.settings.batchSize,
			concurrency: this.settings.concurrency,
			logger: this.logger ?? undefined,
		});
		progressCallback?.(records.length, records.length, 'Writing records');

		stats.recordsWritten = result.written;
		stats.rejected = result.rejected;
		stats.failedBatches.push(
			...result.failedBatches.map(batch => ({...batch, stage: 'upsert' as const})),
		);

		this.logger?.info(
			'Ingest',
			`Ingest complete: ${stats.recordsWritten} written, ${stats.rejected.length} rejected, ${stats.failedBatches.length} failed batches`,
		);
		return stats;
	}

	private async embedPayloads(
		payloads: CodePayload[],
		stats: IngestStats,
		progressCallback?: ProgressCallback,
	): Promise<CodeRecord[]> {
		const size = Math.max(1, this.settings.embedBatchSize);
		const batches: CodePayload[][] = [];
		for (let i = 0; i < payloads.length; i += size) {
			batches.push(payloads.slice(i, i + size));
		}

		const limit = pLimit(Math.max(1, this.settings.concurrency));
		let embedded = 0;

		const outcomes = await Promise.all(
			batches.map((batch, index) =>
				limit(async (): Promise<CodeRecord[]> => {
					try {
						const vectors = await this.embeddings.embed(batch.map(p => p.code));
						if (vectors.length !== batch.length) {
							throw new Error(
								`Expected ${batch.length} embeddings, received ${vectors.length}`,
							);
						}
						embedded += batch.length;
						progressCallback?.(embedded, payloads.length, 'Embedding units');
						return batch.map((payload, i): CodeRecord => ({
							kind: 'code',
							id: codeRecordId(payload),
							vector: vectors[i] ?? [],
							payload,
						}));
					} catch (error) {
						const failure = toError(error);
						this.logger?.error(
							'Ingest',
							`Embedding batch ${index} (${batch.length} units) failed`,
							failure,
						);
						stats.failedBatches.push({
							stage: 'embed',
							index,
							size: batch.length,
							message: failure.message,
						});
						return [];
					}
				}),
			),
		);

		stats.failedBatches.sort((a, b) => a.index - b.index);
		return outcomes.flat();
	}
}
