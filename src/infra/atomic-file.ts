import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

/**
 * Atomic write: write to a temp file in the same directory, then rename over
 * the target. A crash mid-write leaves either the old file or the new one.
 *
 * Temp names end in ".tmp" so directory listings that filter on ".json"
 * never see them.
 */
export function writeFileAtomic(filePath: string, content: string): void {
	const dir = path.dirname(filePath);
	fs.mkdirSync(dir, { recursive: true });

	const tempPath = path.join(
		dir,
		`.${path.basename(filePath)}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`,
	);
	try {
		fs.writeFileSync(tempPath, content, { encoding: "utf-8", mode: 0o600 });
		fs.renameSync(tempPath, filePath);
	} catch (err) {
		fs.rmSync(tempPath, { force: true });
		throw err;
	}
}

export function writeJsonAtomic(filePath: string, data: unknown): void {
	writeFileAtomic(filePath, `${JSON.stringify(data, null, 2)}\n`);
}
