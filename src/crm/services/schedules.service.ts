import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Schedule } from '@common/entities/schedule.entity';
import { ScheduleStatus } from '@common/enums/request-status.enum';
import type { NewSchedule, ScheduleFilter } from '../interfaces/customer-request.interface';
import { DEFAULT_LIST_LIMIT } from './orders.service';

@Injectable()
export class SchedulesService {
  private readonly logger = new Logger(SchedulesService.name);

  constructor(@InjectRepository(Schedule) private readonly schedulesRepository: Repository<Schedule>) {}

  async create(input: NewSchedule): Promise<Schedule> {
    const schedule = await this.schedulesRepository.save(
      this.schedulesRepository.create({ ...input, notes: input.notes ?? null, status: ScheduleStatus.PENDING }),
    );
    this.logger.log(`Consultation #${schedule.id} scheduled for ${schedule.customerName}`);
    return schedule;
  }

  async findById(id: number): Promise<Schedule> {
    const schedule = await this.schedulesRepository.findOneBy({ id });
    if (!schedule) {
      throw new NotFoundException(`Schedule ${id} not found`);
    }
    return schedule;
  }

  async list(filter: ScheduleFilter = {}): Promise<Schedule[]> {
    return this.schedulesRepository.find({
      where: filter.status ? { status: filter.status } : {},
      order: { createdAt: 'DESC', id: 'DESC' },
      take: filter.limit ?? DEFAULT_LIST_LIMIT,
    });
  }

  async updateStatus(id: number, status: ScheduleStatus, notes?: string): Promise<Schedule> {
    const schedule = await this.findById(id);
    schedule.status = status;
    if (notes !== undefined) {
      schedule.notes = notes;
    }
    return this.schedulesRepository.save(schedule);
  }

  async countByStatus(status: ScheduleStatus): Promise<number> {
    return this.schedulesRepository.countBy({ status });
  }
}
