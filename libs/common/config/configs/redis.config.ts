import env from '../config.validator';

export default () => ({
	host: env.get('REDIS_HOST').default('127.0.0.1').asString(),
	port: env.get('REDIS_PORT').default('6379').asPortNumber(),
	password: env.get('REDIS_PASSWORD').asString(),
});
