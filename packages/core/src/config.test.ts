import path from "node:path";
import { describe, expect, it } from "vitest";
import {
	DEFAULT_API_BASE_URL,
	DEFAULT_OAUTH_BASE_URL,
	loadDeskConfig,
} from "./config";
import { ConfigError } from "./errors";

describe("loadDeskConfig", () => {
	it("falls back to sandbox endpoints and the default log file", () => {
		const config = loadDeskConfig({}, { baseDir: "/srv/desk" });

		expect(config.gateway.oauthBaseUrl).toBe(DEFAULT_OAUTH_BASE_URL);
		expect(config.gateway.apiBaseUrl).toBe(DEFAULT_API_BASE_URL);
		expect(config.gateway.consumerKey).toBe("");
		expect(config.tradeLogPath).toBe(path.join("/srv/desk", "trade_log.csv"));
	});

	it("reads credentials and strips trailing slashes from endpoints", () => {
		const config = loadDeskConfig(
			{
				CONSUMER_SANDBOX_KEY: "test-key",
				CONSUMER_SANDBOX_SECRET: "test-secret",
				ETRADE_API_BASE_URL: "http://localhost:9000/v1/market/",
				TRADE_LOG_PATH: "/tmp/trades.csv",
			},
			{ requireCredentials: true }
		);

		expect(config.gateway.consumerKey).toBe("test-key");
		expect(config.gateway.consumerSecret).toBe("test-secret");
		expect(config.gateway.apiBaseUrl).toBe("http://localhost:9000/v1/market");
		expect(config.tradeLogPath).toBe("/tmp/trades.csv");
	});

	it("names every missing credential when they are required", () => {
		expect(() =>
			loadDeskConfig({ CONSUMER_SANDBOX_KEY: "test-key" }, { requireCredentials: true })
		).toThrowError("Missing sandbox credentials: CONSUMER_SANDBOX_SECRET");
	});

	it("rejects an endpoint that is not a URL", () => {
		expect(() =>
			loadDeskConfig({ ETRADE_OAUTH_BASE_URL: "not a url" }, { baseDir: "/srv" })
		).toThrow(ConfigError);
	});
});
