import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { PlaceOrderDto } from '../dtos/place-order.dto';
import { PaymentDetailsDto } from '../dtos/payment-details.dto';

describe('PlaceOrderDto', () => {
  const validBody = {
    customerId: 'customer-123',
    productCode: 'MONITOR-27',
    quantity: 1,
    unitPrice: 299.99,
    payment: { cardNumber: '4000123412341234', cvv: '123', expiry: '12/27' },
  };

  const validateBody = (body: object) =>
    validate(plainToInstance(PlaceOrderDto, body));

  it('should accept a complete order', async () => {
    await expect(validateBody(validBody)).resolves.toEqual([]);
  });

  it('should turn the payment into a PaymentDetailsDto', () => {
    expect(plainToInstance(PlaceOrderDto, validBody).payment).toBeInstanceOf(
      PaymentDetailsDto,
    );
  });

  it.each([0, -1, 1.5])('should reject a quantity of %p', async (quantity) => {
    const errors = await validateBody({ ...validBody, quantity });

    expect(errors.map((error) => error.property)).toEqual(['quantity']);
  });

  it('should reject a non-positive unit price', async () => {
    const errors = await validateBody({ ...validBody, unitPrice: 0 });

    expect(errors.map((error) => error.property)).toEqual(['unitPrice']);
  });

  it('should require payment details', async () => {
    const { payment: _payment, ...withoutPayment } = validBody;

    const errors = await validateBody(withoutPayment);

    expect(errors.map((error) => error.property)).toEqual(['payment']);
  });

  it('should validate nested payment fields', async () => {
    const errors = await validateBody({
      ...validBody,
      payment: { cardNumber: '', expiry: '13/27' },
    });

    expect(errors.map((error) => error.property)).toEqual(['payment']);
    expect(errors[0].children?.map((child) => child.property)).toEqual([
      'cardNumber',
      'expiry',
    ]);
  });
});
