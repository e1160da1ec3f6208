import fs from "node:fs/promises";
import path from "node:path";

export async function readJson<T>(filePath: string, fallback: T): Promise<T> {
	try {
		const content = await fs.readFile(filePath, "utf8");
		return JSON.parse(content) as T;
	} catch (err: unknown) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") {
			return fallback;
		}
		throw err;
	}
}

export async function writeText(
	filePath: string,
	content: string,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.writeFile(filePath, content, "utf8");
}

export async function writeJson(
	filePath: string,
	data: unknown,
): Promise<void> {
	await writeText(filePath, JSON.stringify(data, null, 2));
}

export async function appendLines(
	filePath: string,
	lines: string[],
): Promise<void> {
	if (!lines.length) return;
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.appendFile(filePath, `${lines.join("\n")}\n`, "utf8");
}
