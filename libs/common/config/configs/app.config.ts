import env from '../config.validator';

export const APP_MODES = ['web', 'bot', 'both'] as const;

export type AppMode = (typeof APP_MODES)[number];

export default () => ({
	mode: env.get('APP_MODE').default('both').asEnum(APP_MODES),
	port: env.get('PORT').required().asPortNumber(),
});
