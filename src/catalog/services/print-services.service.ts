import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PrintService } from '@common/entities/print-service.entity';
import { Product } from '@common/entities/product.entity';
import type { CatalogStats, NewService, ServiceInput } from '../interfaces/catalog.interface';

@Injectable()
export class PrintServicesService {
  private readonly logger = new Logger(PrintServicesService.name);

  constructor(@InjectRepository(PrintService) private readonly servicesRepository: Repository<PrintService>) {}

  async listActive(): Promise<PrintService[]> {
    return this.servicesRepository.find({
      where: { isActive: true },
      order: { category: 'ASC', name: 'ASC' },
    });
  }

  async listAll(): Promise<PrintService[]> {
    return this.servicesRepository.find({ order: { category: 'ASC', name: 'ASC' } });
  }

  async activeNames(): Promise<string[]> {
    const services = await this.listActive();
    return services.map((service) => service.name);
  }

  async count(): Promise<number> {
    return this.servicesRepository.count();
  }

  async findById(id: number): Promise<PrintService> {
    const service = await this.servicesRepository.findOneBy({ id });
    if (!service) {
      throw new NotFoundException(`Service ${id} not found`);
    }
    return service;
  }

  async findByName(name: string): Promise<PrintService | null> {
    return this.servicesRepository.findOneBy({ name });
  }

  async create(input: NewService): Promise<PrintService> {
    await this.assertNameAvailable(input.name);
    const service = await this.servicesRepository.save(this.servicesRepository.create(input));
    this.logger.log(`Service "${service.name}" created with id ${service.id}`);
    return service;
  }

  async update(id: number, input: ServiceInput): Promise<PrintService> {
    const service = await this.findById(id);
    if (input.name !== undefined && input.name !== service.name) {
      await this.assertNameAvailable(input.name);
    }
    return this.servicesRepository.save(this.servicesRepository.merge(service, input));
  }

  /** Removes the service together with its products. */
  async remove(id: number): Promise<void> {
    const service = await this.findById(id);
    await this.servicesRepository.manager.transaction(async (manager) => {
      await manager.delete(Product, { serviceId: service.id });
      await manager.delete(PrintService, { id: service.id });
    });
    this.logger.log(`Service "${service.name}" (${id}) deleted`);
  }

  async stats(): Promise<CatalogStats> {
    const services = await this.listAll();
    return {
      totalServices: services.length,
      activeServices: services.filter((service) => service.isActive).length,
      categories: new Set(services.map((service) => service.category)).size,
    };
  }

  private async assertNameAvailable(name: string): Promise<void> {
    if (await this.findByName(name)) {
      throw new ConflictException(`Service "${name}" already exists`);
    }
  }
}
