import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { Product } from '@common/entities/product.entity';
import type { NewProduct, ProductInput } from '../interfaces/catalog.interface';
import { PrintServicesService } from './print-services.service';

@Injectable()
export class ProductsService {
  constructor(
    @InjectRepository(Product) private readonly productsRepository: Repository<Product>,
    private readonly printServicesService: PrintServicesService,
  ) {}

  async listByService(serviceId: number, options: { activeOnly?: boolean } = {}): Promise<Product[]> {
    const where: FindOptionsWhere<Product> = { serviceId };
    if (options.activeOnly) {
      where.isActive = true;
    }
    return this.productsRepository.find({ where, order: { name: 'ASC' } });
  }

  async findById(id: number): Promise<Product> {
    const product = await this.productsRepository.findOneBy({ id });
    if (!product) {
      throw new NotFoundException(`Product ${id} not found`);
    }
    return product;
  }

  async create(serviceId: number, input: NewProduct): Promise<Product> {
    const service = await this.printServicesService.findById(serviceId);
    return this.productsRepository.save(this.productsRepository.create({ ...input, serviceId: service.id }));
  }

  async update(id: number, input: ProductInput): Promise<Product> {
    const product = await this.findById(id);
    return this.productsRepository.save(this.productsRepository.merge(product, input));
  }

  async remove(id: number): Promise<void> {
    const product = await this.findById(id);
    await this.productsRepository.delete({ id: product.id });
  }
}
