export { BufferedChannel } from "./channel";
export { CHUNK_SIZE, DELIMITER_LENGTH } from "./constants";
export {
	GzipFormatError,
	RecordDecodeError,
	RecordStreamError,
	TruncatedArchiveError,
	UnsupportedFormatError,
} from "./errors";
export { GzipMemberChannel } from "./gzip";
export { MemoryChannel } from "./memory";
export {
	type ArchiveFormat,
	createRecordStream,
	type DetectFormatOptions,
	detectArchiveFormat,
	detectFraming,
	detectGrammar,
	openRecordStream,
	RECORD_GRAMMARS,
} from "./open";
export {
	type ContentBounds,
	GzipFileStream,
	GzipRecordStream,
	RecordStream,
} from "./record-stream";
export type {
	ArchiveRecord,
	BoundedReader,
	ByteChannel,
	ChannelOpener,
	ContentReader,
	Framing,
	ReadOutcome,
	ReadRecordsOptions,
	RecordContent,
	RecordParser,
} from "./types";
export * from "../warc/index";
export {
	RequestMessage,
	ResponseMessage,
	type HttpMessageState,
} from "../http/index";
