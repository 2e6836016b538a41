import env from '../config.validator';

export default () => ({
	token: env.get('BOT_TOKEN').asString(),
	apiUrl: env.get('TELEGRAM_API_URL').default('https://api.telegram.org').asString(),
	adminChatId: env.get('ADMIN_CHAT_ID').asString(),
	channelUsername: env.get('CHANNEL_USERNAME').asString(),
	webhookDomain: env.get('WEBHOOK_DOMAIN').asString(),
	webhookPath: env.get('WEBHOOK_PATH').default('/telegram/webhook').asString(),
	sessionTtlSeconds: env.get('SESSION_TTL_SECONDS').default(String(60 * 60 * 6)).asIntPositive(),
});
