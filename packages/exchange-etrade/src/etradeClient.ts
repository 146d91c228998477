import {
	GatewayError,
	MalformedQuoteError,
	createLogger,
	errorMessage,
} from "@kumo/core";
import type { GatewayConfig, QuoteRecord } from "@kumo/core";
import { OAuth1Signer, percentEncode } from "./oauthSigner";
import type { OAuthToken, SignRequestOptions } from "./oauthSigner";
import { mapQuoteResponse } from "./quoteMapper";

const logger = createLogger("exchange:etrade");

const DEFAULT_TIMEOUT_MS = 15_000;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ETradeSandboxClientOptions {
	config: GatewayConfig;
	fetch?: FetchLike;
	signer?: OAuth1Signer;
	timeoutMs?: number;
}

/**
 * Sandbox session: out-of-band OAuth 1.0a handshake followed by quote
 * lookups. The access token lives only in this instance.
 */
export class ETradeSandboxClient {
	private readonly config: GatewayConfig;
	private readonly fetchImpl: FetchLike;
	private readonly signer: OAuth1Signer;
	private readonly timeoutMs: number;
	private accessToken: OAuthToken | null = null;

	constructor(options: ETradeSandboxClientOptions) {
		this.config = options.config;
		this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
		this.signer =
			options.signer ??
			new OAuth1Signer(options.config.consumerKey, options.config.consumerSecret);
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
	}

	hasSession(): boolean {
		return this.accessToken !== null;
	}

	async fetchRequestToken(): Promise<OAuthToken> {
		const url = `${this.config.oauthBaseUrl}/request_token`;
		const body = await this.signedText(url, {
			oauthParams: { oauth_callback: "oob" },
		});
		const token = parseTokenResponse(body, "request token");
		logger.info("request_token_received");
		return token;
	}

	authorizationUrl(requestToken: OAuthToken): string {
		return `${this.config.authorizeUrl}?key=${percentEncode(
			this.signer.consumerKey
		)}&token=${percentEncode(requestToken.token)}`;
	}

	async fetchAccessToken(
		requestToken: OAuthToken,
		verifier: string
	): Promise<OAuthToken> {
		const trimmed = verifier.trim();
		if (!trimmed) {
			throw new GatewayError("A verifier code is required to finish authentication");
		}
		const url = `${this.config.oauthBaseUrl}/access_token`;
		const body = await this.signedText(url, {
			token: requestToken,
			oauthParams: { oauth_verifier: trimmed },
		});
		this.accessToken = parseTokenResponse(body, "access token");
		logger.info("access_token_received");
		return this.accessToken;
	}

	async fetchQuote(symbol: string): Promise<QuoteRecord> {
		const normalized = symbol.trim().toUpperCase();
		if (!normalized) {
			throw new MalformedQuoteError("A symbol is required to fetch a quote");
		}
		if (!this.accessToken) {
			throw new GatewayError("Not authenticated: complete the OAuth handshake first");
		}
		const url = `${this.config.apiBaseUrl}/quote/${percentEncode(normalized)}.json`;
		const body = await this.signedText(url, { token: this.accessToken });

		let payload: unknown;
		try {
			payload = JSON.parse(body);
		} catch (error) {
			throw new MalformedQuoteError(`Quote response for ${normalized} is not JSON`, {
				cause: error,
			});
		}
		const quote = mapQuoteResponse(normalized, payload);
		logger.info("quote_fetched", { ...quote });
		return quote;
	}

	private async signedText(
		url: string,
		signOptions: SignRequestOptions
	): Promise<string> {
		const headers = {
			Authorization: this.signer.authorizationHeader("GET", url, signOptions),
			Accept: "application/json",
		};
		const { response, text } = await this.fetchWithTimeout(url, { method: "GET", headers });
		if (!response.ok) {
			logger.warn("gateway_request_failed", {
				url,
				status: response.status,
				body: text.slice(0, 200),
			});
			throw new GatewayError(
				`Request to ${url} failed with status ${response.status}`,
				response.status
			);
		}
		return text;
	}

	/** The timeout covers the body read as well as the response headers. */
	private async fetchWithTimeout(url: string, init: RequestInit): Promise<TimedResponse> {
		const controller = new AbortController();
		const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
		try {
			const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
			const text = await response.text();
			return { response, text };
		} catch (error) {
			if (controller.signal.aborted || (error instanceof Error && error.name === "AbortError")) {
				throw new GatewayError(`Request to ${url} timed out`, undefined, {
					cause: error,
				});
			}
			throw new GatewayError(`Request to ${url} failed: ${errorMessage(error)}`, undefined, {
				cause: error,
			});
		} finally {
			clearTimeout(timeout);
		}
	}
}

interface TimedResponse {
	response: Response;
	text: string;
}

const parseTokenResponse = (body: string, label: string): OAuthToken => {
	const params = new URLSearchParams(body.trim());
	const token = params.get("oauth_token");
	const secret = params.get("oauth_token_secret");
	if (!token || !secret) {
		throw new GatewayError(`Malformed ${label} response`);
	}
	return { token, secret };
};
