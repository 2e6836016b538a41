import appConfig from './configs/app.config';
import telegramConfig from './configs/telegram.config';
import businessConfig from './configs/business.config';
import adminConfig from './configs/admin.config';
import databaseConfig from './configs/database.config';
import redisConfig from './configs/redis.config';

export class cfg {
	public static get app() {
		return appConfig();
	}

	public static get telegram() {
		return telegramConfig();
	}

	public static get business() {
		return businessConfig();
	}

	public static get admin() {
		return adminConfig();
	}

	public static get database() {
		return databaseConfig();
	}

	public static get redis() {
		return redisConfig();
	}
}
