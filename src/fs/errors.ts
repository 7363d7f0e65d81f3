/** Raised for an `<archive>:<offset>` argument that cannot be split or whose offset is not a non-negative integer. */
export class LocatorError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "LocatorError";
	}
}

/** Raised when no channel opener handles an archive location, such as a URL with no opener configured. */
export class UnsupportedLocationError extends Error {
	readonly location: string;

	constructor(location: string) {
		super(
			`Cannot open "${location}": only local paths are supported without a channel opener.`,
		);
		this.name = "UnsupportedLocationError";
		this.location = location;
	}
}
