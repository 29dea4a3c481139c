import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';
import { PaymentDetails } from '../../payments/interface/payment.interface';

export class PaymentDetailsDto implements PaymentDetails {
  @ApiProperty({
    description: 'Card number; the first digit selects the simulated outcome',
    example: '4000123412341234',
  })
  @IsString()
  @IsNotEmpty()
  cardNumber!: string;

  @ApiPropertyOptional({ example: '123' })
  @IsOptional()
  @Matches(/^\d{3,4}$/, { message: 'cvv must be 3 or 4 digits' })
  cvv?: string;

  @ApiPropertyOptional({ description: 'Expiry as MM/YY', example: '12/27' })
  @IsOptional()
  @Matches(/^(0[1-9]|1[0-2])\/\d{2}$/, {
    message: 'expiry must use the MM/YY format',
  })
  expiry?: string;

  @ApiPropertyOptional({ example: 'Jane Doe' })
  @IsOptional()
  @IsString()
  cardholder?: string;
}
