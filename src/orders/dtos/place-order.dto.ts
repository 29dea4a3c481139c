import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsDefined,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsPositive,
  IsString,
  ValidateNested,
} from 'class-validator';
import { PlaceOrderRequest } from '../interface/order.interface';
import { PaymentDetailsDto } from './payment-details.dto';

export class PlaceOrderDto implements PlaceOrderRequest {
  @ApiProperty({
    description: 'The customer placing the order',
    example: 'customer-001',
  })
  @IsString()
  @IsNotEmpty()
  customerId!: string;

  @ApiProperty({ description: 'The product code', example: 'MONITOR-27' })
  @IsString()
  @IsNotEmpty()
  productCode!: string;

  @ApiProperty({
    description: 'The quantity of the product',
    minimum: 1,
    example: 1,
  })
  @IsInt()
  @IsPositive()
  quantity!: number;

  @ApiProperty({ description: 'Price of a single unit', example: 299.99 })
  @IsNumber()
  @IsPositive()
  unitPrice!: number;

  @ApiProperty({ type: PaymentDetailsDto })
  @IsDefined()
  @ValidateNested()
  @Type(() => PaymentDetailsDto)
  payment!: PaymentDetailsDto;
}
