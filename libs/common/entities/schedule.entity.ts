import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';
import { ScheduleStatus } from '@common/enums/request-status.enum';

@Entity({ name: 'schedules' })
export class Schedule {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'customer_name', type: 'varchar', length: 100 })
  customerName!: string;

  @Column({ name: 'contact_info', type: 'varchar', length: 200 })
  contactInfo!: string;

  @Column({ name: 'preferred_datetime', type: 'varchar', length: 200 })
  preferredDatetime!: string;

  @Column({ type: 'varchar', length: 20, default: ScheduleStatus.PENDING })
  status!: ScheduleStatus;

  @Column({ name: 'telegram_user_id', type: 'varchar', length: 32, nullable: true })
  telegramUserId!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'datetime' })
  createdAt!: Date;
}
