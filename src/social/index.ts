import type { HeraldConfig } from "../config/config.js";
import type { Channel } from "../engage/types.js";
import { getChildLogger } from "../logging.js";
import { MoltbookClient } from "./backends/moltbook.js";
import { XClient } from "./backends/xtwitter.js";
import type { ChannelSender, InboundSource } from "./client.js";

export type { ChannelSender, InboundSource } from "./client.js";
export { MoltbookClient } from "./backends/moltbook.js";
export { XClient } from "./backends/xtwitter.js";

const logger = getChildLogger({ module: "social" });

export type ChannelWiring = {
	senders: Partial<Record<Channel, ChannelSender>>;
	/** Configured X account id, when known up front. */
	userId?: string;
	resolveUserId?: () => Promise<string>;
	mentionsFor?: (userId: string) => InboundSource;
	searches: InboundSource[];
};

/**
 * Factory: build channel clients from config. Environment variables win
 * over the config file for credentials and base URLs.
 *
 * A channel without credentials gets no sender; its queued jobs stay in
 * the outbox until one is configured.
 */
export function createChannels(
	config: HeraldConfig,
	env: NodeJS.ProcessEnv = process.env,
	fetchImpl?: typeof fetch,
): ChannelWiring {
	const wiring: ChannelWiring = { senders: {}, searches: [] };

	const xConfig = config.channels.x;
	if (xConfig.enabled) {
		const bearerToken = env.X_USER_ACCESS_TOKEN || xConfig.bearerToken;
		if (bearerToken) {
			const x = new XClient({
				bearerToken,
				baseUrl: env.X_API_BASE || xConfig.baseUrl,
				fetchImpl,
			});
			wiring.senders.x = x;
			wiring.userId = env.X_USER_ID || xConfig.userId;
			wiring.resolveUserId = () => x.me();
			wiring.mentionsFor = (userId) => x.mentions(userId);
			wiring.searches = Object.entries(config.planner.initiation.queries)
				.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
				.map(([label, query]) => x.search(label, query));
		} else {
			logger.warn("X_USER_ACCESS_TOKEN not set; X channel has no sender");
		}
	}

	const moltbookConfig = config.channels.moltbook;
	if (moltbookConfig.enabled) {
		const apiKey = env.MOLTBOOK_APP_KEY || moltbookConfig.apiKey;
		if (apiKey) {
			wiring.senders.moltbook = new MoltbookClient({
				apiKey,
				baseUrl: env.MOLTBOOK_API_BASE || moltbookConfig.baseUrl,
				fetchImpl,
			});
		} else {
			logger.warn("MOLTBOOK_APP_KEY not set; Moltbook channel has no sender");
		}
	}

	return wiring;
}
