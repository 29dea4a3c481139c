export enum OrderStatus {
  COMPLETED = 'COMPLETED',
  CANCELLED = 'CANCELLED',
}

export enum OrderFailureReason {
  INSUFFICIENT_STOCK = 'Insufficient stock',
  RESERVATION_FAILED = 'Unable to reserve stock',
  INTERNAL_ERROR = 'Internal error while processing order',
}

export enum CancellationFailureReason {
  NOT_FOUND = 'Order not found',
  WRONG_CUSTOMER = 'Order does not belong to this customer',
  ALREADY_CANCELLED = 'Order is already cancelled',
  INTERNAL_ERROR = 'Internal error while cancelling order',
}

export enum OrderAuditEvent {
  ORDER_PLACED = 'Order placed',
  ORDER_FAILED = 'Order failed',
  ORDER_CANCELLED = 'Order cancelled',
  CANCELLATION_REJECTED = 'Cancellation rejected',
}
