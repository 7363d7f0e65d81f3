export {
	WARC_HEADER,
	WARC_TYPE,
	WARC_VERSION,
	type WarcType,
} from "./constants";
export { WarcParser } from "./parser";
export {
	formatWarcDate,
	type NewWarcRecord,
	type WarcHeader,
	WarcRecord,
} from "./record";
