import os from "node:os";
import path from "node:path";

export function sleep(ms: number) {
	return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Wall-clock source in epoch milliseconds. Components take one of these
 * instead of calling Date.now() so tests can pin time.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Convert a clock reading to whole unix seconds.
 */
export function unixSeconds(clock: Clock): number {
	return Math.floor(clock() / 1000);
}

export const CONFIG_DIR = path.join(os.homedir(), ".herald");
