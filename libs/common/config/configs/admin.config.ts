import env from '../config.validator';

export default () => ({
	password: env.get('ADMIN_PASSWORD').required().asString(),
	secretKey: env.get('ADMIN_SECRET_KEY').required().asString(),
	sessionTtl: env.get('ADMIN_SESSION_TTL').default('12h').asString(),
	cookieName: 'admin_session',
});
