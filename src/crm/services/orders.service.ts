import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Order } from '@common/entities/order.entity';
import { OrderStatus } from '@common/enums/request-status.enum';
import type { NewOrder, OrderFilter } from '../interfaces/customer-request.interface';

export const DEFAULT_LIST_LIMIT = 100;

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(@InjectRepository(Order) private readonly ordersRepository: Repository<Order>) {}

  async create(input: NewOrder): Promise<Order> {
    const order = await this.ordersRepository.save(
      this.ordersRepository.create({ ...input, notes: input.notes ?? null, status: OrderStatus.PENDING }),
    );
    this.logger.log(`Order #${order.id} created for ${order.customerName}`);
    return order;
  }

  async findById(id: number): Promise<Order> {
    const order = await this.ordersRepository.findOneBy({ id });
    if (!order) {
      throw new NotFoundException(`Order ${id} not found`);
    }
    return order;
  }

  async list(filter: OrderFilter = {}): Promise<Order[]> {
    return this.ordersRepository.find({
      where: filter.status ? { status: filter.status } : {},
      order: { createdAt: 'DESC', id: 'DESC' },
      take: filter.limit ?? DEFAULT_LIST_LIMIT,
    });
  }

  async updateStatus(id: number, status: OrderStatus, notes?: string): Promise<Order> {
    const order = await this.findById(id);
    order.status = status;
    if (notes !== undefined) {
      order.notes = notes;
    }
    const saved = await this.ordersRepository.save(order);
    this.logger.log(`Order #${id} moved to ${status}`);
    return saved;
  }

  async countByStatus(status: OrderStatus): Promise<number> {
    return this.ordersRepository.countBy({ status });
  }
}
