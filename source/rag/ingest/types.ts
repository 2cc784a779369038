import type {FailedBatch} from '../storage/batching.js';
import type {RejectedRecord} from '../storage/types.js';

/**
 * A batch that failed as a whole, and the stage it failed in.
 */
export interface IngestFailure extends FailedBatch {
	stage: 'embed' | 'upsert';
}

/**
 * Statistics from one ingest run.
 */
export interface IngestStats {
	/** Files listed in the artifact */
	filesSeen: number;
	/** Units read from the artifact (syntax units and windows) */
	unitsSeen: number;
	/** Units dropped because their trimmed code was empty */
	skippedEmpty: number;
	/** Records the store accepted */
	recordsWritten: number;
	/** Records the store refused, with reasons */
	rejected: RejectedRecord[];
	/** Embedding or upsert batches that failed as a whole */
	failedBatches: IngestFailure[];
}

/**
 * Progress callback for ingest operations.
 */
export type ProgressCallback = (
	current: number,
	total: number,
	stage: string,
) => void;

/**
 * Create empty ingest stats.
 */
export function createEmptyIngestStats(): IngestStats {
	return {
		filesSeen: 0,
		unitsSeen: 0,
		skippedEmpty: 0,
		recordsWritten: 0,
		rejected: [],
		failedBatches: [],
	};
}
