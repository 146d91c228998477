import { config as dotenvConfig } from "dotenv";
import { existsSync, readFileSync } from "node:fs";
import path from "node:path";

const loaded = new Set<string>();
let cachedWorkspaceRoot: string | undefined;

export function loadEnvFiles(projectRoot: string = getWorkspaceRoot()): string[] {
	const candidates = filterUnique(
		[process.env.KUMO_ENV_FILE, ".env", ".env.local"].filter(
			(value): value is string => Boolean(value)
		)
	);

	const applied: string[] = [];
	candidates.forEach((candidate) => {
		const fullPath = path.isAbsolute(candidate)
			? candidate
			: path.join(projectRoot, candidate);
		if (!existsSync(fullPath) || loaded.has(fullPath)) {
			return;
		}
		dotenvConfig({ path: fullPath, override: true });
		loaded.add(fullPath);
		applied.push(fullPath);
	});
	return applied;
}

const declaresWorkspaces = (dir: string): boolean => {
	const manifest = path.join(dir, "package.json");
	if (!existsSync(manifest)) {
		return false;
	}
	try {
		const parsed: unknown = JSON.parse(readFileSync(manifest, "utf8"));
		return typeof parsed === "object" && parsed !== null && "workspaces" in parsed;
	} catch {
		return false;
	}
};

/**
 * Walks up from cwd to the package.json that declares npm workspaces; falls
 * back to cwd when none is found.
 */
export const getWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}
	let current = process.cwd();
	while (!declaresWorkspaces(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}
	cachedWorkspaceRoot = current;
	return current;
};

function filterUnique(values: string[]): string[] {
	return values.filter((value, index) => values.indexOf(value) === index);
}
