import path from "node:path";
import { ConfigError } from "./errors";
import { getWorkspaceRoot } from "./env";

export const DEFAULT_OAUTH_BASE_URL = "https://apisb.etrade.com/oauth";
export const DEFAULT_API_BASE_URL = "https://apisb.etrade.com/v1/market";
export const DEFAULT_AUTHORIZE_URL = "https://us.etrade.com/e/t/etws/authorize";
export const DEFAULT_TRADE_LOG_PATH = "trade_log.csv";

export interface GatewayConfig {
	consumerKey: string;
	consumerSecret: string;
	oauthBaseUrl: string;
	apiBaseUrl: string;
	authorizeUrl: string;
}

export interface DeskConfig {
	gateway: GatewayConfig;
	tradeLogPath: string;
}

export interface DeskConfigOptions {
	/** Fail when the sandbox consumer key or secret is absent. */
	requireCredentials?: boolean;
	/** Base for a relative TRADE_LOG_PATH; defaults to the workspace root. */
	baseDir?: string;
}

type EnvSource = Record<string, string | undefined>;

const readString = (env: EnvSource, key: string): string | undefined => {
	const value = env[key]?.trim();
	return value ? value : undefined;
};

const readUrl = (env: EnvSource, key: string, fallback: string): string => {
	const value = readString(env, key) ?? fallback;
	try {
		new URL(value);
	} catch {
		throw new ConfigError(`${key} is not a valid URL: ${value}`);
	}
	return value.replace(/\/+$/, "");
};

export const loadDeskConfig = (
	env: EnvSource = process.env,
	options: DeskConfigOptions = {}
): DeskConfig => {
	const consumerKey = readString(env, "CONSUMER_SANDBOX_KEY") ?? "";
	const consumerSecret = readString(env, "CONSUMER_SANDBOX_SECRET") ?? "";
	if (options.requireCredentials) {
		const missing = [
			consumerKey ? null : "CONSUMER_SANDBOX_KEY",
			consumerSecret ? null : "CONSUMER_SANDBOX_SECRET",
		].filter((key): key is string => key !== null);
		if (missing.length) {
			throw new ConfigError(`Missing sandbox credentials: ${missing.join(", ")}`);
		}
	}

	const rawLogPath = readString(env, "TRADE_LOG_PATH") ?? DEFAULT_TRADE_LOG_PATH;
	const tradeLogPath = path.isAbsolute(rawLogPath)
		? rawLogPath
		: path.join(options.baseDir ?? getWorkspaceRoot(), rawLogPath);

	return {
		gateway: {
			consumerKey,
			consumerSecret,
			oauthBaseUrl: readUrl(env, "ETRADE_OAUTH_BASE_URL", DEFAULT_OAUTH_BASE_URL),
			apiBaseUrl: readUrl(env, "ETRADE_API_BASE_URL", DEFAULT_API_BASE_URL),
			authorizeUrl: readUrl(env, "ETRADE_AUTHORIZE_URL", DEFAULT_AUTHORIZE_URL),
		},
		tradeLogPath,
	};
};
