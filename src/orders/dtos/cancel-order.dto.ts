import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class CancelOrderDto {
  @ApiProperty({
    description: 'The customer that owns the order',
    example: 'customer-001',
  })
  @IsString()
  @IsNotEmpty()
  customerId!: string;
}
