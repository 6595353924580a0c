import fs from "node:fs";

import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "status-source" });

/**
 * Result of reading the external monitor's status record.
 * "present" carries the parsed but unvalidated JSON value.
 */
export type StatusRead =
	| { kind: "absent" }
	| { kind: "unreadable"; error: string }
	| { kind: "present"; value: unknown };

export interface StatusSource {
	read(): Promise<StatusRead>;
}

/**
 * Reads `{ last_tick_utc, data_freshness_sec }` from a JSON file written by
 * the monitoring process.
 */
export class FileStatusSource implements StatusSource {
	constructor(private readonly filePath: string) {}

	async read(): Promise<StatusRead> {
		let raw: string;
		try {
			raw = await fs.promises.readFile(this.filePath, "utf-8");
		} catch (err) {
			if ((err as NodeJS.ErrnoException).code === "ENOENT") {
				return { kind: "absent" };
			}
			logger.warn({ file: this.filePath, error: String(err) }, "status file not readable");
			return { kind: "unreadable", error: String(err) };
		}

		try {
			return { kind: "present", value: JSON.parse(raw) };
		} catch (err) {
			logger.warn({ file: this.filePath, error: String(err) }, "status file is not valid JSON");
			return { kind: "unreadable", error: String(err) };
		}
	}
}
