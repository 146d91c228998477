import readline from "node:readline/promises";

export interface Prompter {
	ask(question: string): Promise<string>;
	close(): void;
}

export const createReadlinePrompter = (
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stdout
): Prompter => {
	const rl = readline.createInterface({ input, output });
	return {
		ask: async (question) => (await rl.question(question)).trim(),
		close: () => rl.close(),
	};
};
