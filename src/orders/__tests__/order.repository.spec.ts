import { OrderRepository } from '../repository/order.repository';
import { OrderStatus } from '../enums/order.enums';
import { OrderRecord } from '../interface/order.interface';

describe('OrderRepository', () => {
  let repository: OrderRepository;

  const order: OrderRecord = {
    orderId: 'ORDER-123',
    customerId: 'customer-123',
    productCode: 'PROD-1',
    quantity: 2,
    unitPrice: 100,
    totalAmount: 200,
    transactionId: 'tx-test-123',
    shipmentId: 'ship-test-123',
    trackingNumber: 'TRK12345678',
    estimatedDelivery: '2026-10-21',
    status: OrderStatus.COMPLETED,
    createdAt: '2026-10-18T10:00:00.000Z',
  };

  beforeEach(() => {
    repository = new OrderRepository();
  });

  it('should store and find orders by id', () => {
    repository.createOrder(order);

    expect(repository.findOrderById('ORDER-123')).toEqual(order);
    expect(repository.findOrderById('INVALID-ID')).toBeNull();
  });

  it('should not expose stored records to mutation', () => {
    const created = repository.createOrder(order);
    created.status = OrderStatus.CANCELLED;

    const found = repository.findOrderById('ORDER-123');
    if (found) {
      found.quantity = 99;
    }

    expect(repository.findOrderById('ORDER-123')).toEqual(order);
  });

  it('should find orders by customer', () => {
    repository.createOrder(order);
    repository.createOrder({ ...order, orderId: 'ORDER-456' });
    repository.createOrder({
      ...order,
      orderId: 'ORDER-789',
      customerId: 'customer-456',
    });

    expect(
      repository.findOrdersByCustomer('customer-123').map((o) => o.orderId),
    ).toEqual(['ORDER-123', 'ORDER-456']);
    expect(repository.findOrdersByCustomer('customer-000')).toEqual([]);
  });

  it('should update the order status', () => {
    repository.createOrder(order);

    expect(
      repository.updateOrderStatus('ORDER-123', OrderStatus.CANCELLED),
    ).toEqual({ ...order, status: OrderStatus.CANCELLED });
    expect(repository.findOrderById('ORDER-123')?.status).toBe(
      OrderStatus.CANCELLED,
    );
    expect(
      repository.updateOrderStatus('INVALID-ID', OrderStatus.CANCELLED),
    ).toBeNull();
  });

  it('should count orders and failures separately', () => {
    repository.createOrder(order);
    repository.recordFailure({
      orderId: 'ORDER-999',
      customerId: 'customer-123',
      reason: 'Insufficient stock',
      createdAt: '2026-10-18T10:00:00.000Z',
    });

    expect(repository.countOrders()).toBe(1);
    expect(repository.countFailures()).toBe(1);
  });
});
