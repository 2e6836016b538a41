import { ApiProperty } from '@nestjs/swagger';

export class ServiceRto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: 'Business Cards' })
  name!: string;

  @ApiProperty({ type: String, nullable: true })
  description!: string | null;

  @ApiProperty({ example: 'cards' })
  category!: string;

  @ApiProperty({ example: 0 })
  basePrice!: number;

  @ApiProperty({ type: String, nullable: true, example: '$50-200 per 1000' })
  priceRange!: string | null;

  @ApiProperty()
  isActive!: boolean;

  @ApiProperty({ type: String, nullable: true })
  imageUrl!: string | null;

  @ApiProperty({ example: '1-3 business days' })
  processingTime!: string;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;
}

export class ProductRto {
  @ApiProperty({ example: 3 })
  id!: number;

  @ApiProperty({ example: 1 })
  serviceId!: number;

  @ApiProperty({ example: 'Matte 350gsm' })
  name!: string;

  @ApiProperty({ type: String, nullable: true })
  description!: string | null;

  @ApiProperty({ example: 0.12 })
  price!: number;

  @ApiProperty({ example: 'each' })
  unit!: string;

  @ApiProperty({ example: 100 })
  minQuantity!: number;

  @ApiProperty()
  isActive!: boolean;

  @ApiProperty({ type: 'object', additionalProperties: { type: 'string' }, nullable: true })
  specifications!: Record<string, string> | null;
}

export class SettingRto {
  @ApiProperty({ example: 'welcome_message' })
  key!: string;

  @ApiProperty({ example: 'Your trusted printing partner.' })
  value!: string;

  @ApiProperty({ type: String, nullable: true })
  description!: string | null;

  @ApiProperty()
  updatedAt!: Date;
}
