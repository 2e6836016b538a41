import { ApiProperty } from '@nestjs/swagger';
import { OrderRto } from './requests.rto';

export class DashboardRto {
  @ApiProperty({ example: 6 })
  totalServices!: number;

  @ApiProperty({ example: 5 })
  activeServices!: number;

  @ApiProperty({ example: 4 })
  categories!: number;

  @ApiProperty({ example: 42 })
  totalUsers!: number;

  @ApiProperty({ example: 3 })
  pendingOrders!: number;

  @ApiProperty({ example: 1 })
  pendingSchedules!: number;

  @ApiProperty({ example: 2 })
  pendingMessages!: number;

  @ApiProperty({ type: [OrderRto] })
  recentOrders!: OrderRto[];
}
