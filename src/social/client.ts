import type { Channel, InboundBatch, Receipt } from "../engage/types.js";

/**
 * Outbound side of a channel backend.
 *
 * Each backend (X, Moltbook) implements this interface. The engager is
 * channel-agnostic and dispatches through this contract. Failures throw
 * ChannelSendError; a returned receipt always means the send succeeded.
 */
export interface ChannelSender {
	readonly channel: Channel;

	/** Create a new standalone post. */
	post(text: string): Promise<Receipt>;

	/** Reply to an existing post. */
	reply(targetId: string, text: string): Promise<Receipt>;
}

/**
 * Inbound side: mentions or a search, read from a cursor.
 */
export interface InboundSource {
	/** Label used in ledger evidence and as the search cursor key. */
	readonly label: string;

	fetch(sinceCursor: string | undefined, maxResults: number): Promise<InboundBatch>;
}
