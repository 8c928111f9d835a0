export interface AtrInput {
	high: number;
	low: number;
	close: number;
}

export function calculateATRSeries(
	candles: readonly AtrInput[],
	period = 14
): number[] {
	if (period <= 0 || candles.length < period + 1) {
		return [];
	}

	const trueRanges = computeTrueRanges(candles);
	let atr =
		trueRanges.slice(0, period).reduce((acc, value) => acc + value, 0) / period;
	const series: number[] = [atr];

	for (let i = period; i < trueRanges.length; i += 1) {
		atr = (atr * (period - 1) + trueRanges[i]) / period;
		series.push(atr);
	}

	return series;
}

export const trueRange = (current: AtrInput, previousClose: number): number =>
	Math.max(
		current.high - current.low,
		Math.abs(current.high - previousClose),
		Math.abs(current.low - previousClose)
	);

const computeTrueRanges = (candles: readonly AtrInput[]): number[] => {
	const trueRanges: number[] = [];
	for (let i = 1; i < candles.length; i += 1) {
		trueRanges.push(trueRange(candles[i], candles[i - 1].close));
	}
	return trueRanges;
};

/**
 * Streaming Wilder ATR. Seeds with the mean of the first `period` true ranges,
 * so the first value appears on bar `period + 1`, matching calculateATRSeries.
 */
export class WilderAtr {
	private previousClose: number | null = null;
	private seedSum = 0;
	private seedCount = 0;
	private current: number | null = null;
	private bars = 0;

	constructor(readonly period: number) {
		if (!Number.isInteger(period) || period < 1) {
			throw new RangeError(`ATR period must be a positive integer, got ${period}`);
		}
	}

	update(bar: AtrInput): number | null {
		this.bars += 1;
		if (this.previousClose === null) {
			this.previousClose = bar.close;
			return null;
		}
		const range = trueRange(bar, this.previousClose);
		this.previousClose = bar.close;

		if (this.current === null) {
			this.seedSum += range;
			this.seedCount += 1;
			if (this.seedCount === this.period) {
				this.current = this.seedSum / this.period;
			}
			return this.current;
		}

		this.current = (this.current * (this.period - 1) + range) / this.period;
		return this.current;
	}

	get value(): number | null {
		return this.current;
	}

	get barsRemaining(): number {
		return Math.max(this.period + 1 - this.bars, 0);
	}
}
