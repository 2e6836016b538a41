import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, JoinColumn } from 'typeorm';
import { OrderStatus } from '@common/enums/request-status.enum';
import { PrintService } from './print-service.entity';

@Entity({ name: 'orders' })
export class Order {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'customer_name', type: 'varchar', length: 100 })
  customerName!: string;

  @Column({ name: 'company_name', type: 'varchar', length: 100, nullable: true })
  companyName!: string | null;

  @Column({ name: 'product_type', type: 'varchar', length: 100 })
  productType!: string;

  @Column({ name: 'service_id', type: 'integer', nullable: true })
  serviceId!: number | null;

  @ManyToOne(() => PrintService, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'service_id' })
  service?: PrintService | null;

  @Column({ type: 'integer' })
  quantity!: number;

  @Column({ name: 'delivery_date', type: 'varchar', length: 10 })
  deliveryDate!: string;

  @Column({ name: 'contact_info', type: 'varchar', length: 200 })
  contactInfo!: string;

  @Column({ name: 'telegram_user_id', type: 'varchar', length: 32, nullable: true })
  telegramUserId!: string | null;

  @Column({ name: 'order_status', type: 'varchar', length: 20, default: OrderStatus.PENDING })
  status!: OrderStatus;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'datetime' })
  createdAt!: Date;
}
