import { Bar, DataError } from "@trendline/core";

const PRICE_FIELDS = ["open", "high", "low", "close"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Checks a bar the engine is about to consume. Prices must be finite and
 * positive, volume finite and non-negative, and `low <= open, close <= high`.
 */
export const validateBar = (bar: Bar, location = bar.symbol): Bar => {
	if (typeof bar.symbol !== "string" || bar.symbol.trim().length === 0) {
		throw new DataError(`Bar at ${location} has an empty symbol`, { location });
	}
	if (!Number.isFinite(bar.timestamp)) {
		throw new DataError(`Bar ${bar.symbol} at ${location} has an invalid timestamp`, {
			location,
			timestamp: bar.timestamp,
		});
	}
	for (const field of PRICE_FIELDS) {
		const value = bar[field];
		if (!Number.isFinite(value) || value <= 0) {
			throw new DataError(`Bar ${bar.symbol} at ${location} has invalid ${field}`, {
				location,
				field,
				value,
			});
		}
	}
	if (!Number.isFinite(bar.volume) || bar.volume < 0) {
		throw new DataError(`Bar ${bar.symbol} at ${location} has invalid volume`, {
			location,
			volume: bar.volume,
		});
	}
	const top = Math.max(bar.open, bar.close);
	const bottom = Math.min(bar.open, bar.close);
	if (bar.high < top || bar.low > bottom) {
		throw new DataError(
			`Bar ${bar.symbol} at ${location} has a high/low range that excludes open or close`,
			{ location, open: bar.open, high: bar.high, low: bar.low, close: bar.close }
		);
	}
	return bar;
};

const toNumber = (value: unknown): number => {
	if (typeof value === "number") {
		return value;
	}
	if (typeof value === "string" && value.trim().length > 0) {
		return Number(value);
	}
	return Number.NaN;
};

/** Epoch milliseconds, numeric strings included, or an ISO-8601 date. */
export const parseTimestamp = (value: unknown): number => {
	if (typeof value === "number") {
		return value;
	}
	if (typeof value !== "string") {
		return Number.NaN;
	}
	const trimmed = value.trim();
	if (/^-?\d+$/.test(trimmed)) {
		return Number(trimmed);
	}
	return Date.parse(trimmed);
};

/** Narrows an untyped record (a parsed JSON element or CSV row) into a Bar. */
export const parseBar = (raw: unknown, location: string): Bar => {
	if (!isRecord(raw)) {
		throw new DataError(`Expected a bar object at ${location}`, { location });
	}
	const symbol = typeof raw.symbol === "string" ? raw.symbol.trim() : "";
	const bar: Bar = {
		symbol,
		timestamp: parseTimestamp(raw.timestamp),
		open: toNumber(raw.open),
		high: toNumber(raw.high),
		low: toNumber(raw.low),
		close: toNumber(raw.close),
		volume: toNumber(raw.volume),
	};
	return validateBar(bar, location);
};
