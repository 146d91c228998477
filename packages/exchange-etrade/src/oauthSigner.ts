/**
 * OAuth 1.0a request signer (HMAC-SHA1), as the E*TRADE API expects.
 *
 * Signature base string: METHOD & encoded base URL & encoded, sorted
 * parameter string (query parameters plus every oauth_* field except the
 * signature itself). Signing key: consumerSecret & tokenSecret.
 */

import crypto from "node:crypto";

export interface OAuthToken {
	token: string;
	secret: string;
}

export interface SignRequestOptions {
	token?: OAuthToken;
	/** Extra protocol parameters such as oauth_callback or oauth_verifier. */
	oauthParams?: Record<string, string>;
	nonce?: string;
	timestamp?: string;
}

/** RFC 3986 encoding; encodeURIComponent leaves !'()* alone. */
export const percentEncode = (value: string): string =>
	encodeURIComponent(value).replace(
		/[!'()*]/g,
		(char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
	);

export class OAuth1Signer {
	readonly #consumerKey: string;
	readonly #consumerSecret: string;

	constructor(consumerKey: string, consumerSecret: string) {
		this.#consumerKey = consumerKey;
		this.#consumerSecret = consumerSecret;
	}

	get consumerKey(): string {
		return this.#consumerKey;
	}

	/**
	 * Collects the oauth_* protocol parameters for one request, signature
	 * excluded.
	 */
	protocolParams(options: SignRequestOptions = {}): Record<string, string> {
		const params: Record<string, string> = {
			oauth_consumer_key: this.#consumerKey,
			oauth_nonce: options.nonce ?? crypto.randomBytes(16).toString("hex"),
			oauth_signature_method: "HMAC-SHA1",
			oauth_timestamp: options.timestamp ?? String(Math.floor(Date.now() / 1000)),
			oauth_version: "1.0",
			...(options.oauthParams ?? {}),
		};
		if (options.token) {
			params.oauth_token = options.token.token;
		}
		return params;
	}

	signatureBaseString(
		method: string,
		url: string,
		protocolParams: Record<string, string>
	): string {
		const parsed = new URL(url);
		const pairs: [string, string][] = [];
		parsed.searchParams.forEach((value, key) => {
			pairs.push([percentEncode(key), percentEncode(value)]);
		});
		for (const [key, value] of Object.entries(protocolParams)) {
			pairs.push([percentEncode(key), percentEncode(value)]);
		}
		pairs.sort(([keyA, valueA], [keyB, valueB]) => {
			if (keyA !== keyB) {
				return keyA < keyB ? -1 : 1;
			}
			return valueA < valueB ? -1 : valueA > valueB ? 1 : 0;
		});
		const paramString = pairs.map(([key, value]) => `${key}=${value}`).join("&");
		const baseUrl = `${parsed.protocol}//${parsed.host}${parsed.pathname}`;

		return [
			method.toUpperCase(),
			percentEncode(baseUrl),
			percentEncode(paramString),
		].join("&");
	}

	sign(baseString: string, tokenSecret = ""): string {
		const key = `${percentEncode(this.#consumerSecret)}&${percentEncode(tokenSecret)}`;
		return crypto.createHmac("sha1", key).update(baseString).digest("base64");
	}

	/**
	 * Builds the `Authorization: OAuth ...` header value for a request.
	 */
	authorizationHeader(
		method: string,
		url: string,
		options: SignRequestOptions = {}
	): string {
		const params = this.protocolParams(options);
		const signature = this.sign(
			this.signatureBaseString(method, url, params),
			options.token?.secret
		);
		const fields = Object.entries({ ...params, oauth_signature: signature })
			.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
			.map(([key, value]) => `${percentEncode(key)}="${percentEncode(value)}"`);

		return `OAuth ${fields.join(",")}`;
	}
}
