export { FileSource, type FileSourceOptions } from "./file-source";
export {
	JournalSource,
	type JournalSourceOptions,
	type SpawnedProcess,
	type SpawnProcess,
} from "./journal-source";
export { decodeJsonLine, LineDecoder } from "./line-decoder";
export { registerBuiltinSources, SourceRegistry } from "./registry";
export type { LogSource, SourceFactory, SourceParams } from "./source";
