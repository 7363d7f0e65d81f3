import { LocatorError } from "./errors";

const OFFSET_PATTERN = /^\d+$/;

/** Where a record lives: an archive location and the record's offset in it. */
export interface RecordLocator {
	readonly location: string;
	readonly offset: number;
}

/**
 * Splits `<archive>:<offset>` at its last colon, so locations that contain
 * colons themselves still parse.
 */
export function parseLocator(locator: string): RecordLocator {
	const colon = locator.lastIndexOf(":");
	if (colon <= 0) {
		throw new LocatorError(
			`Expected <archive>:<offset>, got "${locator}".`,
		);
	}

	const location = locator.slice(0, colon);
	const text = locator.slice(colon + 1);
	const offset = Number(text);

	if (!OFFSET_PATTERN.test(text) || !Number.isSafeInteger(offset)) {
		throw new LocatorError(
			`Invalid offset "${text}" in "${locator}": expected a non-negative integer.`,
		);
	}

	return { location, offset };
}
