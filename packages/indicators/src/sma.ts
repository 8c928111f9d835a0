import { RollingWindow } from "./rollingWindow";

/** Mean of the last `period` values, recomputed from scratch. */
export function sma(values: readonly number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}

	const window = values.slice(values.length - period);
	const sum = window.reduce((acc, value) => acc + value, 0);
	return sum / period;
}

export class IncrementalSma {
	private readonly window: RollingWindow;

	constructor(readonly period: number) {
		this.window = new RollingWindow(period);
	}

	update(value: number): number | null {
		this.window.push(value);
		return this.value;
	}

	/** Null until `period` values have been seen. */
	get value(): number | null {
		return this.window.isFull ? this.window.mean() : null;
	}
}
