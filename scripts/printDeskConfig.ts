import { loadDeskConfig, loadEnvFiles } from "@kumo/core";

const redact = (value: string): string =>
	value ? `${value.slice(0, 2)}***` : "<unset>";

const main = (): void => {
	const envFiles = loadEnvFiles();
	const config = loadDeskConfig();

	console.log("# env files");
	console.log(envFiles.length ? envFiles.join("\n") : "<none>");
	console.log("\n# desk config");
	console.log(
		JSON.stringify(
			{
				...config,
				gateway: {
					...config.gateway,
					consumerKey: redact(config.gateway.consumerKey),
					consumerSecret: redact(config.gateway.consumerSecret),
				},
			},
			null,
			2
		)
	);
};

main();
