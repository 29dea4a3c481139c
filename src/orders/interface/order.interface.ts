import { StockLedger } from '../../inventory/interface/inventory.interface';
import {
  NotificationStats,
} from '../../notifications/interface/notification.interface';
import { PaymentDetails } from '../../payments/interface/payment.interface';
import { TrackingInfo } from '../../shipping/interface/shipping.interface';
import { OrderStatus } from '../enums/order.enums';

export interface PlaceOrderRequest {
  customerId: string;
  productCode: string;
  quantity: number;
  payment: PaymentDetails;
  unitPrice: number;
}

export interface OrderResult {
  readonly success: boolean;
  readonly orderId: string;
  readonly reason?: string;
  readonly transactionId?: string;
  readonly shipmentId?: string;
  readonly trackingNumber?: string;
  readonly totalAmount?: number;
  readonly estimatedDelivery?: string;
}

export interface OrderRecord {
  orderId: string;
  customerId: string;
  productCode: string;
  quantity: number;
  unitPrice: number;
  totalAmount: number;
  transactionId?: string;
  shipmentId?: string;
  trackingNumber?: string;
  estimatedDelivery?: string;
  status: OrderStatus;
  createdAt: string;
}

export interface FailedOrderRecord {
  orderId: string;
  customerId: string;
  reason: string;
  createdAt: string;
}

export interface OrderStatusView extends OrderRecord {
  shippingStatus: TrackingInfo | null;
}

export interface CancellationResult {
  readonly success: boolean;
  readonly orderId: string;
  readonly reason?: string;
  readonly refundTransactionId?: string;
}

export interface SystemStats {
  totalSuccessfulOrders: number;
  totalFailedOrders: number;
  successRatePercentage: number;
  inventoryStatus: StockLedger;
  notificationStats: NotificationStats;
}
