import { ApiProperty } from '@nestjs/swagger';

export class SuccessResponseRto<T> {
	@ApiProperty({ example: true })
	success!: true;

	@ApiProperty()
	data!: T;
}

export const success = <T>(data: T): SuccessResponseRto<T> => ({ success: true, data });
