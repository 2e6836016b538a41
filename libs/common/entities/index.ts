import { TelegramUser } from './telegram-user.entity';
import { PrintService } from './print-service.entity';
import { Product } from './product.entity';
import { Order } from './order.entity';
import { Schedule } from './schedule.entity';
import { CustomerMessage } from './customer-message.entity';
import { Setting } from './setting.entity';

export { TelegramUser, PrintService, Product, Order, Schedule, CustomerMessage, Setting };

export const ENTITIES = [TelegramUser, PrintService, Product, Order, Schedule, CustomerMessage, Setting];
