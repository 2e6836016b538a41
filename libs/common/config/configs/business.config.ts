import env from '../config.validator';

export default () => ({
	name: env.get('BUSINESS_NAME').default('Printing Business').asString(),
	email: env.get('BUSINESS_EMAIL').default('contact@example.com').asString(),
	phone: env.get('BUSINESS_PHONE').default('+1234567890').asString(),
	address: env.get('BUSINESS_ADDRESS').default('Business Address').asString(),
});
