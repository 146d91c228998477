export interface QuoteRecord {
	readonly symbol: string;
	readonly open: number;
	readonly high: number;
	readonly low: number;
	/** Last traded price (`lastTrade` in the broker feed). */
	readonly close: number;
}

export type QuoteSeries = readonly QuoteRecord[];

export type TradeActionType = "buy_call" | "buy_put" | "hold";

export const TRADE_ACTIONS: readonly TradeActionType[] = [
	"buy_call",
	"buy_put",
	"hold",
];

export interface TradeDecision {
	readonly symbol: string;
	readonly action: TradeActionType;
	readonly price: number;
}

export interface TradeLogEntry extends TradeDecision {
	readonly timestamp: Date;
}

/** Nullable point in an indicator series; `null` where a window or shift has no data. */
export type SeriesValue = number | null;

export interface IchimokuSeries {
	tenkanSen: SeriesValue[];
	kijunSen: SeriesValue[];
	senkouSpanA: SeriesValue[];
	senkouSpanB: SeriesValue[];
	chikouSpan: SeriesValue[];
}
