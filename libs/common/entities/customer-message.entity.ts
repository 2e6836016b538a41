import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';
import { MessageStatus } from '@common/enums/request-status.enum';

@Entity({ name: 'messages' })
export class CustomerMessage {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'customer_name', type: 'varchar', length: 100 })
  customerName!: string;

  @Column({ name: 'contact_info', type: 'varchar', length: 200 })
  contactInfo!: string;

  @Column({ name: 'message_text', type: 'text' })
  messageText!: string;

  @Column({ type: 'varchar', length: 20, default: MessageStatus.PENDING })
  status!: MessageStatus;

  @Column({ type: 'text', nullable: true })
  response!: string | null;

  @Column({ name: 'telegram_user_id', type: 'varchar', length: 32, nullable: true })
  telegramUserId!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'datetime' })
  createdAt!: Date;
}
