import env from '../config.validator';

export default () => ({
	path: env.get('DATABASE_PATH').default('data/print-shop.db').asString(),
	logging: env.get('DATABASE_LOGGING').default('false').asBool(),
});
