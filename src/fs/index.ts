export { LocatorError, UnsupportedLocationError } from "./errors";
export {
	type ExtractPayloadOptions,
	extractPayload,
	type PayloadWarning,
	type PayloadWarningKind,
} from "./extract";
export { FileChannel } from "./file";
export { parseLocator, type RecordLocator } from "./locator";
export { type OpenArchiveOptions, openArchive, openFileChannel } from "./open";
