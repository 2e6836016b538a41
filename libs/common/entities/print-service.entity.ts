import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, OneToMany } from 'typeorm';
import { Product } from './product.entity';

@Entity({ name: 'services' })
export class PrintService {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 100, unique: true })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'varchar', length: 50, default: 'general' })
  category!: string;

  @Column({ name: 'base_price', type: 'real', default: 0 })
  basePrice!: number;

  @Column({ name: 'price_range', type: 'varchar', length: 100, nullable: true })
  priceRange!: string | null;

  @Column({ name: 'is_active', type: 'boolean', default: true })
  isActive!: boolean;

  @Column({ name: 'image_url', type: 'varchar', length: 500, nullable: true })
  imageUrl!: string | null;

  @Column({ name: 'processing_time', type: 'varchar', length: 100, default: '1-3 business days' })
  processingTime!: string;

  @OneToMany(() => Product, (product) => product.service)
  products?: Product[];

  @CreateDateColumn({ name: 'created_at', type: 'datetime' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'datetime' })
  updatedAt!: Date;
}
