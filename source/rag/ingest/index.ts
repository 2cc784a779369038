export {
	Ingester,
	artifactPayloads,
	unitPayload,
	type IngestOptions,
	type IngestSettings,
	type IngesterDeps,
} from './ingester.js';
export {
	createEmptyIngestStats,
	type IngestFailure,
	type IngestStats,
	type ProgressCallback,
} from './types.js';
