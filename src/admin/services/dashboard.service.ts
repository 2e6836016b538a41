import { Injectable } from '@nestjs/common';
import { MessageStatus, OrderStatus, ScheduleStatus } from '@common/enums/request-status.enum';
import { PrintServicesService } from 'src/catalog/services/print-services.service';
import { MessagesService } from 'src/crm/services/messages.service';
import { OrdersService } from 'src/crm/services/orders.service';
import { SchedulesService } from 'src/crm/services/schedules.service';
import { UsersService } from 'src/crm/services/users.service';
import { DashboardRto } from '../rto/dashboard.rto';

export const RECENT_ORDERS_LIMIT = 5;

@Injectable()
export class DashboardService {
  constructor(
    private readonly printServicesService: PrintServicesService,
    private readonly usersService: UsersService,
    private readonly ordersService: OrdersService,
    private readonly schedulesService: SchedulesService,
    private readonly messagesService: MessagesService,
  ) {}

  async getOverview(): Promise<DashboardRto> {
    const [catalog, totalUsers, pendingOrders, pendingSchedules, pendingMessages, recentOrders] = await Promise.all([
      this.printServicesService.stats(),
      this.usersService.count(),
      this.ordersService.countByStatus(OrderStatus.PENDING),
      this.schedulesService.countByStatus(ScheduleStatus.PENDING),
      this.messagesService.countByStatus(MessageStatus.PENDING),
      this.ordersService.list({ limit: RECENT_ORDERS_LIMIT }),
    ]);

    return { ...catalog, totalUsers, pendingOrders, pendingSchedules, pendingMessages, recentOrders };
  }
}
