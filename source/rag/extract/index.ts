/**
 * Unit extraction: syntax-tree declarations plus line windows.
 */

export {
	UnitExtractor,
	extractorOptions,
	readArtifact,
	writeArtifact,
	type ExtractorOptions,
} from './extractor.js';
export {SyntaxExtractor, type SyntaxPassResult} from './parser.js';
export {chunkByLines, sliceLines, splitLines, type LineWindow} from './lines.js';
export {precedingComments, type CommentStyle} from './comments.js';
export {cleanDoc} from './docstring.js';
export {EXTENSION_TO_LANGUAGE, languageForPath} from './grammars.js';
export {
	renderCodeText,
	lineSliceStrategy,
	syntaxTreeStrategy,
	type CodeTextPath,
	type CodeTextStrategy,
} from './source-strategy.js';
export * from './types.js';
