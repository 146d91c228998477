export type ArgValue = string | boolean;

export interface DeskCliOptions {
	symbol?: string;
	quotesPath?: string;
	targetPrice?: number;
	chartRows: number;
	dryRun: boolean;
	help: boolean;
}

export const USAGE = `Usage:
  npm run desk -- [symbol] [options]

Options:
  --symbol <symbol>   Symbol to quote (otherwise prompted)
  --quotes <path>     CSV quote history (open,high,low,close|lastTrade)
  --target <price>    Target price (otherwise prompted)
  --rows <n>          Chart rows to print (default 30)
  --dry-run           Keep the trade log in memory
  --help              Show this message`;

const DEFAULT_CHART_ROWS = 30;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.symbol === undefined) {
		args.symbol = positionals[0];
	}
	return args;
};

const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length ? value : undefined;
};

/**
 * Two-decimal, non-negative target price; null when the input is not one.
 */
export const parseTargetPrice = (raw: string | undefined): number | null => {
	if (raw === undefined || !raw.trim().length) {
		return null;
	}
	const value = Number(raw.trim().replace(/^\$/, ""));
	if (!Number.isFinite(value) || value < 0) {
		return null;
	}
	return Math.round(value * 100) / 100;
};

export const resolveDeskOptions = (argv: string[]): DeskCliOptions => {
	const args = parseCliArgs(argv);
	const rawRows = getStringArg(args, "rows");
	const rows = rawRows ? Number.parseInt(rawRows, 10) : DEFAULT_CHART_ROWS;
	const rawPrice = getStringArg(args, "target");

	return {
		symbol: getStringArg(args, "symbol"),
		quotesPath: getStringArg(args, "quotes"),
		targetPrice: parseTargetPrice(rawPrice) ?? undefined,
		chartRows: Number.isFinite(rows) && rows > 0 ? rows : DEFAULT_CHART_ROWS,
		dryRun: args["dry-run"] === true || args["dry-run"] === "true",
		help: args.help === true,
	};
};
