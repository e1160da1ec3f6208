import axios from "axios";
import { config } from "../config";
import { logger } from "../utils/logger";

export type ParseMode = "HTML" | "Markdown";

export type TelegramUpdate = {
	update_id: number;
	message?: {
		message_id: number;
		chat: { id: number };
		from?: { id: number; username?: string };
		text?: string;
	};
};

type TelegramResponse<T> = {
	ok: boolean;
	result: T;
	description?: string;
};

function apiUrl(method: string): string {
	return `https://api.telegram.org/bot${config.telegram.botToken}/${method}`;
}

export function isTelegramConfigured(): boolean {
	return Boolean(config.telegram.botToken && config.telegram.chatId);
}

/** Never throws: a failed send is logged and reported as `false`. */
export async function sendTelegramMessage(
	text: string,
	parseMode: ParseMode = "HTML",
): Promise<boolean> {
	if (!isTelegramConfigured()) {
		logger.warn("Telegram bot token or chat id missing, skipping notification");
		return false;
	}

	try {
		await axios.post(
			apiUrl("sendMessage"),
			{
				chat_id: config.telegram.chatId,
				text,
				parse_mode: parseMode,
			},
			{ timeout: 10_000 },
		);
		logger.debug("Telegram message sent");
		return true;
	} catch (error) {
		logger.error({ error }, "Telegram message failed");
		return false;
	}
}

export async function fetchTelegramUpdates(
	offset: number,
	timeoutSec: number,
	signal?: AbortSignal,
): Promise<TelegramUpdate[]> {
	const { data } = await axios.get<TelegramResponse<TelegramUpdate[]>>(
		apiUrl("getUpdates"),
		{
			params: { offset, timeout: timeoutSec, allowed_updates: '["message"]' },
			timeout: (timeoutSec + 10) * 1000,
			signal,
		},
	);

	if (!data.ok) {
		throw new Error(`getUpdates failed: ${data.description ?? "unknown error"}`);
	}
	return data.result;
}
