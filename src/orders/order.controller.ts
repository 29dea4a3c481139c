import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import {
  ApiOperation,
  ApiParam,
  ApiQuery,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { OrderFacade } from './order.facade';
import { PlaceOrderDto } from './dtos/place-order.dto';
import { CancelOrderDto } from './dtos/cancel-order.dto';
import {
  CancellationResult,
  OrderRecord,
  OrderResult,
  OrderStatusView,
  SystemStats,
} from './interface/order.interface';

@ApiTags('orders')
@Controller('orders')
export class OrderController {
  constructor(private readonly orderFacade: OrderFacade) {}

  @Post()
  @ApiOperation({ summary: 'Place a new order' })
  @ApiResponse({
    status: 201,
    description: 'Order processed; `success` reports the outcome',
  })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  async placeOrder(@Body() placeOrderDto: PlaceOrderDto): Promise<OrderResult> {
    return await this.orderFacade.placeOrder(placeOrderDto);
  }

  @Get()
  @ApiOperation({ summary: 'List the orders of a customer' })
  @ApiQuery({ name: 'customerId', description: 'Customer ID' })
  @ApiResponse({ status: 200, description: 'Order history' })
  @ApiResponse({ status: 400, description: 'customerId is missing' })
  getOrderHistory(@Query('customerId') customerId?: string): OrderRecord[] {
    if (!customerId) {
      throw new HttpException('customerId is required', HttpStatus.BAD_REQUEST);
    }
    return this.orderFacade.getOrderHistory(customerId);
  }

  @Get('stats')
  @ApiOperation({ summary: 'Get order, inventory and notification statistics' })
  @ApiResponse({ status: 200, description: 'System statistics' })
  getSystemStats(): SystemStats {
    return this.orderFacade.getSystemStats();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an order by ID' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiResponse({ status: 200, description: 'Order found' })
  @ApiResponse({ status: 404, description: 'Order not found' })
  getOrder(@Param('id') id: string): OrderStatusView {
    const order = this.orderFacade.getOrderStatus(id);
    if (!order) {
      throw new HttpException('Order not found', HttpStatus.NOT_FOUND);
    }
    return order;
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel an order' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiResponse({
    status: 200,
    description: 'Cancellation processed; `success` reports the outcome',
  })
  async cancelOrder(
    @Param('id') id: string,
    @Body() cancelOrderDto: CancelOrderDto,
  ): Promise<CancellationResult> {
    return await this.orderFacade.cancelOrder(id, cancelOrderDto.customerId);
  }
}
