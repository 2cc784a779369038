import {DenseSearchUnavailableError} from '../errors.js';
import type {Logger} from '../logger/index.js';

/**
 * One way of running a dense query against a backend.
 */
export interface DenseQueryPath<Q, R> {
	readonly name: string;
	/** Capability check made once, at negotiation time */
	available(): boolean;
	run(query: Q): Promise<R>;
}

/**
 * Picks the newest dense query path a backend supports and falls back to
 * older paths, in order, when the pinned one rejects a call.
 *
 * Paths are listed newest first.
 */
export class DenseQueryRouter<Q, R> {
	private readonly collection: string;
	private readonly paths: Array<DenseQueryPath<Q, R>>;
	private readonly logger: Logger | null;
	private pinned: number | null = null;

	constructor(
		collection: string,
		paths: Array<DenseQueryPath<Q, R>>,
		logger?: Logger,
	) {
		this.collection = collection;
		this.paths = paths;
		this.logger = logger ?? null;
	}

	/**
	 * Pin the first available path. Throws when none is available.
	 */
	negotiate(): string {
		const index = this.paths.findIndex(path => path.available());
		if (index === -1) {
			throw new DenseSearchUnavailableError(this.collection, []);
		}
		this.pinned = index;
		const selected = this.paths[index]?.name ?? '';
		this.logger?.debug('Storage', 'Dense query path selected', {
			collection: this.collection,
			path: selected,
		});
		return selected;
	}

	/** Name of the pinned path, or null before negotiate() */
	get selected(): string | null {
		return this.pinned === null ? null : (this.paths[this.pinned]?.name ?? null);
	}

	/**
	 * Run the query on the pinned path, then on each older path until one
	 * succeeds.
	 */
	async run(query: Q): Promise<R> {
		if (this.pinned === null) {
			this.negotiate();
		}
		const first = this.pinned ?? 0;
		const attempts: Array<{path: string; message: string}> = [];

		for (const path of this.paths.slice(first)) {
			try {
				const result = await path.run(query);
				if (attempts.length > 0) {
					this.logger?.warn('Storage', 'Dense query fell back to an older path', {
						collection: this.collection,
						path: path.name,
						failed: attempts,
					});
				}
				return result;
			} catch (error) {
				attempts.push({
					path: path.name,
					message: error instanceof Error ? error.message : String(error),
				});
			}
		}

		throw new DenseSearchUnavailableError(this.collection, attempts);
	}
}
