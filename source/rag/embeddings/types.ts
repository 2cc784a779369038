/**
 * Turns text into dense vectors. One provider embeds both indexed units and
 * queries, so their vectors share a space.
 */
export interface EmbeddingProvider {
	/** Vector length; must equal the store's configured dimensions */
	readonly dimensions: number;

	/** Check credentials or endpoint settings. Call once before embedding. */
	initialize(): Promise<void>;

	/** One vector per input text, in input order */
	embed(texts: string[]): Promise<number[][]>;

	/** Vector for a single text, typically a query */
	embedSingle(text: string): Promise<number[]>;

	/** Release clients; initialize() may be called again afterwards */
	close(): void;
}
