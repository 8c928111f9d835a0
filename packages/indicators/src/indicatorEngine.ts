import {
	Bar,
	DataError,
	IndicatorConfig,
	IndicatorReading,
	IndicatorState,
	SequenceError,
} from "@trendline/core";
import { RollingWindow } from "./rollingWindow";
import { IncrementalSma } from "./sma";
import { WilderAtr } from "./atr";

interface SymbolTrack {
	closes: IncrementalSma;
	smaHistory: RollingWindow;
	volumes: IncrementalSma;
	atr: WilderAtr;
	barsSeen: number;
	lastTimestamp: number | null;
	lastClose: number | null;
	state: IndicatorState | null;
}

const warming = (barsRemaining: number): IndicatorReading => {
	const reading: IndicatorReading = {
		status: "warming_up",
		barsRemaining: Math.max(barsRemaining, 1),
	};
	return Object.freeze(reading);
};

const ready = (value: number): IndicatorReading => {
	const reading: IndicatorReading = { status: "ready", value };
	return Object.freeze(reading);
};

/**
 * Owns per-symbol indicator history. Every lookback-dependent reading stays
 * `warming_up` until its window is full; partial windows are never averaged.
 */
export class IndicatorEngine {
	private readonly tracks = new Map<string, SymbolTrack>();

	constructor(private readonly config: Readonly<IndicatorConfig>) {}

	update(symbol: string, bar: Bar): IndicatorState {
		if (bar.symbol !== symbol) {
			throw new DataError(
				`Bar for ${bar.symbol} routed to indicator track ${symbol}`,
				{ symbol, barSymbol: bar.symbol }
			);
		}
		const track = this.ensureTrack(symbol);
		if (track.lastTimestamp !== null && bar.timestamp <= track.lastTimestamp) {
			throw new SequenceError(
				bar.timestamp === track.lastTimestamp
					? `Duplicate bar for ${symbol} at ${bar.timestamp}`
					: `Out-of-order bar for ${symbol}: ${bar.timestamp} after ${track.lastTimestamp}`,
				{ symbol, timestamp: bar.timestamp, lastTimestamp: track.lastTimestamp }
			);
		}

		const { lookback, slopeLookback } = this.config;
		const previousSma = track.closes.value;
		const previousClose = track.lastClose;

		const sma = track.closes.update(bar.close);
		const averageVolume = track.volumes.update(bar.volume);
		track.atr.update(bar);
		track.barsSeen += 1;
		track.lastTimestamp = bar.timestamp;
		track.lastClose = bar.close;

		if (sma !== null) {
			track.smaHistory.push(sma);
		}

		const slope =
			track.smaHistory.isFull && sma !== null
				? sma - (track.smaHistory.oldest() ?? sma)
				: null;
		const atr = track.atr.value;
		const seen = track.barsSeen;

		const state: IndicatorState = Object.freeze({
			symbol,
			timestamp: bar.timestamp,
			barsSeen: seen,
			close: bar.close,
			previousClose,
			warmingUp: sma === null,
			values: Object.freeze({
				sma: sma !== null ? ready(sma) : warming(lookback - seen),
				previousSma:
					previousSma !== null
						? ready(previousSma)
						: warming(lookback + 1 - seen),
				smaSlope:
					slope !== null
						? ready(slope)
						: warming(lookback + slopeLookback - seen),
				atr: atr !== null ? ready(atr) : warming(track.atr.barsRemaining),
				averageVolume:
					averageVolume !== null
						? ready(averageVolume)
						: warming(this.config.volumeLookback - seen),
			}),
		});
		track.state = state;
		return state;
	}

	state(symbol: string): IndicatorState | null {
		return this.tracks.get(symbol)?.state ?? null;
	}

	barsSeen(symbol: string): number {
		return this.tracks.get(symbol)?.barsSeen ?? 0;
	}

	symbols(): string[] {
		return Array.from(this.tracks.keys()).sort();
	}

	reset(symbol: string): void {
		this.tracks.delete(symbol);
	}

	private ensureTrack(symbol: string): SymbolTrack {
		const existing = this.tracks.get(symbol);
		if (existing) {
			return existing;
		}
		const created: SymbolTrack = {
			closes: new IncrementalSma(this.config.lookback),
			smaHistory: new RollingWindow(this.config.slopeLookback + 1),
			volumes: new IncrementalSma(this.config.volumeLookback),
			atr: new WilderAtr(this.config.atrPeriod),
			barsSeen: 0,
			lastTimestamp: null,
			lastClose: null,
			state: null,
		};
		this.tracks.set(symbol, created);
		return created;
	}
}
