import {
	ConfigError,
	createLogger,
	errorMessage,
	loadDeskConfig,
	loadEnvFiles,
} from "@kumo/core";
import { ETradeSandboxClient } from "@kumo/exchange-etrade";
import { CsvTradeLog, InMemoryTradeLog } from "@kumo/persistence";
import type { TradeLog } from "@kumo/persistence";
import { USAGE, resolveDeskOptions } from "./cliArgs";
import { runDeskSession } from "./deskSession";
import { createReadlinePrompter } from "./prompts";

const logger = createLogger("desk-cli");

const main = async (): Promise<void> => {
	const options = resolveDeskOptions(process.argv.slice(2));
	if (options.help) {
		console.log(USAGE);
		return;
	}
	const envFiles = loadEnvFiles();
	const config = loadDeskConfig(process.env, { requireCredentials: true });
	const tradeLog: TradeLog = options.dryRun
		? new InMemoryTradeLog()
		: new CsvTradeLog(config.tradeLogPath);

	logger.info("cli_starting", {
		envFiles,
		symbol: options.symbol ?? null,
		quotesPath: options.quotesPath ?? null,
		dryRun: options.dryRun,
		tradeLogPath: options.dryRun ? null : config.tradeLogPath,
		apiBaseUrl: config.gateway.apiBaseUrl,
	});

	const prompter = createReadlinePrompter();
	try {
		const outcome = await runDeskSession(options, {
			gateway: new ETradeSandboxClient({ config: config.gateway }),
			prompter,
			tradeLog,
			write: (line) => console.log(line),
		});
		logger.info("cli_finished", { status: outcome.status });
		if (outcome.status !== "completed") {
			process.exitCode = 2;
		}
	} finally {
		prompter.close();
	}
};

main().catch((error) => {
	if (error instanceof ConfigError) {
		console.error(error.message);
	}
	logger.error("cli_unhandled_error", {
		message: errorMessage(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
