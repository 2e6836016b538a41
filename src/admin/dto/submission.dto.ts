import { Transform } from 'class-transformer';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { PassesValidator } from '@shared/decorators/passes-validator.decorator';
import {
  validateCompanyName,
  validateContactInfo,
  validateDatetimePreference,
  validateDeliveryDate,
  validateMessageText,
  validateName,
  validateQuantity,
} from '@shared/validators/input.validators';

class CustomerContactDto {
  @ApiProperty({ example: 'John Doe' })
  @PassesValidator(validateName)
  name!: string;

  @ApiProperty({ example: 'john@example.com', description: 'E-mail address or phone number' })
  @PassesValidator(validateContactInfo)
  contact!: string;
}

export class SubmitOrderDto extends CustomerContactDto {
  @ApiPropertyOptional({ example: 'Smith & Sons' })
  @IsOptional()
  @PassesValidator(validateCompanyName)
  company?: string;

  @ApiProperty({ example: 'Business Cards' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  productType!: string;

  @ApiProperty({ example: '500', description: 'Whole number from 1 to 100,000; JSON numbers are accepted too' })
  @Transform(({ value }) => (typeof value === 'number' ? String(value) : value))
  @PassesValidator(validateQuantity)
  quantity!: string;

  @ApiProperty({ example: '25/12/2030', description: 'Tomorrow at the earliest, at most a year ahead' })
  @PassesValidator(validateDeliveryDate)
  deliveryDate!: string;

  @ApiPropertyOptional({ example: 'Matte finish, rounded corners' })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  notes?: string;
}

export class SubmitScheduleDto extends CustomerContactDto {
  @ApiProperty({ example: '25/12/2030 14:30', description: 'A date and time or a free-form preference' })
  @PassesValidator(validateDatetimePreference)
  preferredDatetime!: string;

  @ApiPropertyOptional({ example: 'About a rebrand' })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  notes?: string;
}

export class SubmitMessageDto extends CustomerContactDto {
  @ApiProperty({ example: 'Do you print on recycled paper?' })
  @PassesValidator(validateMessageText)
  message!: string;
}
