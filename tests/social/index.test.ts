import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { parseConfig } from "../../src/config/config.js";
import { MoltbookClient, XClient, createChannels } from "../../src/social/index.js";

type FetchInput = Parameters<typeof fetch>[0];

describe("createChannels", () => {
	it("wires no senders without credentials", () => {
		const wiring = createChannels(parseConfig({}), {});

		expect(wiring.senders).toEqual({});
		expect(wiring.searches).toEqual([]);
		expect(wiring.mentionsFor).toBeUndefined();
	});

	it("builds both clients from the environment", () => {
		const config = parseConfig({
			channels: { x: { userId: "from-config" } },
			planner: { initiation: { queries: { security: "appsec", agents: "ai agents" } } },
		});

		const wiring = createChannels(config, {
			X_USER_ACCESS_TOKEN: "test-secret",
			X_USER_ID: "42",
			MOLTBOOK_APP_KEY: "test-secret",
		});

		expect(wiring.senders.x).toBeInstanceOf(XClient);
		expect(wiring.senders.moltbook).toBeInstanceOf(MoltbookClient);
		expect(wiring.userId).toBe("42");
		expect(wiring.searches.map((source) => source.label)).toEqual(["agents", "security"]);
		expect(wiring.mentionsFor?.("42")?.label).toBe("x:mentions");
	});

	it("falls back to config credentials and skips disabled channels", () => {
		const config = parseConfig({
			channels: {
				x: { bearerToken: "test-secret", userId: "7" },
				moltbook: { enabled: false, apiKey: "test-secret" },
			},
		});

		const wiring = createChannels(config, {});

		expect(wiring.senders.x).toBeInstanceOf(XClient);
		expect(wiring.senders.moltbook).toBeUndefined();
		expect(wiring.userId).toBe("7");
	});

	it("routes requests to the configured base url", async () => {
		const fetchImpl = vi.fn(async (input: FetchInput, _init?: RequestInit) => {
			expect(String(input)).toBe("https://x.test/2/tweets");
			return new Response(JSON.stringify({ data: { id: "1" } }), { status: 201 });
		});

		const wiring = createChannels(
			parseConfig({ channels: { moltbook: { enabled: false } } }),
			{ X_USER_ACCESS_TOKEN: "test-secret", X_API_BASE: "https://x.test" },
			fetchImpl,
		);

		await expect(wiring.senders.x?.post("hello")).resolves.toEqual({ ok: true, status: 201, postId: "1" });
	});
});
