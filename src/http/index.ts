export {
	type BodyFraming,
	HttpMessage,
	type HttpMessageState,
	RequestMessage,
	ResponseMessage,
} from "./message";
