import { Entity, Column, PrimaryColumn, UpdateDateColumn } from 'typeorm';

@Entity({ name: 'admin_settings' })
export class Setting {
  @PrimaryColumn({ name: 'setting_key', type: 'varchar', length: 100 })
  key!: string;

  @Column({ name: 'setting_value', type: 'text' })
  value!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  description!: string | null;

  @UpdateDateColumn({ name: 'updated_at', type: 'datetime' })
  updatedAt!: Date;
}
