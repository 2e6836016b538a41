import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { TelegramUser } from "@common/entities/telegram-user.entity";
import { Order } from "@common/entities/order.entity";
import { Schedule } from "@common/entities/schedule.entity";
import { CustomerMessage } from "@common/entities/customer-message.entity";
import { UsersService } from "./services/users.service";
import { OrdersService } from "./services/orders.service";
import { SchedulesService } from "./services/schedules.service";
import { MessagesService } from "./services/messages.service";

@Module({
    imports: [TypeOrmModule.forFeature([TelegramUser, Order, Schedule, CustomerMessage])],
    providers: [UsersService, OrdersService, SchedulesService, MessagesService],
    exports: [UsersService, OrdersService, SchedulesService, MessagesService],
})
export class CrmModule {}
