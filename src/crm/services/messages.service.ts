import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CustomerMessage } from '@common/entities/customer-message.entity';
import { MessageStatus } from '@common/enums/request-status.enum';
import type { MessageFilter, NewCustomerMessage } from '../interfaces/customer-request.interface';
import { DEFAULT_LIST_LIMIT } from './orders.service';

@Injectable()
export class MessagesService {
  private readonly logger = new Logger(MessagesService.name);

  constructor(@InjectRepository(CustomerMessage) private readonly messagesRepository: Repository<CustomerMessage>) {}

  async create(input: NewCustomerMessage): Promise<CustomerMessage> {
    const message = await this.messagesRepository.save(
      this.messagesRepository.create({ ...input, status: MessageStatus.PENDING, response: null }),
    );
    this.logger.log(`Message #${message.id} received from ${message.customerName}`);
    return message;
  }

  async findById(id: number): Promise<CustomerMessage> {
    const message = await this.messagesRepository.findOneBy({ id });
    if (!message) {
      throw new NotFoundException(`Message ${id} not found`);
    }
    return message;
  }

  async list(filter: MessageFilter = {}): Promise<CustomerMessage[]> {
    return this.messagesRepository.find({
      where: filter.status ? { status: filter.status } : {},
      order: { createdAt: 'DESC', id: 'DESC' },
      take: filter.limit ?? DEFAULT_LIST_LIMIT,
    });
  }

  async respond(id: number, status: MessageStatus, response?: string): Promise<CustomerMessage> {
    const message = await this.findById(id);
    message.status = status;
    if (response !== undefined) {
      message.response = response;
    }
    return this.messagesRepository.save(message);
  }

  async countByStatus(status: MessageStatus): Promise<number> {
    return this.messagesRepository.countBy({ status });
  }
}
